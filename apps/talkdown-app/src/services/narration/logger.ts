type LogLevel = 'info' | 'warn' | 'error' | 'debug';

const PREFIX = '[NARRATION]';

// read per call so a test or host can flip the switches after import
function shouldLog(level: LogLevel): boolean {
  const env = process.env;
  if (env['TALKDOWN_LOG'] === 'silent') return false;
  return level !== 'debug' || env['TALKDOWN_DEBUG'] === '1';
}

const formatFields = (data: unknown): string => {
  if (data === undefined) return '';
  if (typeof data !== 'object' || data === null) return ` ${String(data)}`;
  const fields = Object.entries(data).map(([key, value]) => `${key}=${String(value)}`);
  return fields.length > 0 ? ` (${fields.join(', ')})` : '';
};

const write: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function log(level: LogLevel, module: string, message: string, data?: unknown) {
  if (!shouldLog(level)) return;
  const time = new Date().toISOString().slice(11, 23);
  write[level](`${PREFIX}[${time}][${module}] ${message}${formatFields(data)}`);
}

const range = (start: number, end: number) => `${start}-${end}`;

export const narrationLogger = {
  queue: {
    append: (start: number, end: number) => log('debug', 'QUEUE', `Appended ${range(start, end)}`),
    appendMany: (count: number) => log('debug', 'QUEUE', `Appended ${count} utterances`),
    duplicate: (start: number, end: number) =>
      log('warn', 'QUEUE', `Refused duplicate range ${range(start, end)}`),
    insertFront: (priority: number) =>
      log('debug', 'QUEUE', `Inserted at front`, { priority }),
    demoted: (priority: number) =>
      log('warn', 'QUEUE', `Priority ${priority} may not preempt, appended instead`),
    dequeue: (start: number, end: number) => log('debug', 'QUEUE', `Dequeued ${range(start, end)}`),
    recycle: (start: number, end: number, duration: number) =>
      log('debug', 'QUEUE', `Recycled ${range(start, end)} (${duration.toFixed(2)}s)`),
    clear: () => log('info', 'QUEUE', `Cleared main queue`),
    reset: () => log('info', 'QUEUE', `Reset main and recycle queues`),
  },
  chunker: {
    load: (sectionCount: number, textLength: number) =>
      log('info', 'CHUNKER', `Loaded sections`, { sectionCount, textLength }),
    dropped: (count: number) => log('warn', 'CHUNKER', `Dropped ${count} empty or invalid sections`),
    batch: (from: number, count: number) =>
      log('debug', 'CHUNKER', `Minted ${count} utterances from ${from}`),
    exhausted: (from: number) => log('debug', 'CHUNKER', `No content after ${from}`),
  },
  scheduler: {
    load: (textLength: number, position: number) =>
      log('info', 'SCHEDULER', `Document loaded`, { textLength, position }),
    state: (from: string, to: string) => log('debug', 'SCHEDULER', `State ${from} → ${to}`),
    start: (id: string, start: number, end: number) =>
      log('debug', 'SCHEDULER', `Speaking ${id} ${range(start, end)}`),
    stale: (id: string | undefined) =>
      log('debug', 'SCHEDULER', `Ignored stale completion`, { id }),
    rewind: (seconds: number, replayed: number, position: number) =>
      log('info', 'SCHEDULER', `Rewind ${seconds}s`, { replayed, position }),
    skip: (direction: 'next' | 'previous', sectionIndex: number) =>
      log('info', 'SCHEDULER', `Skip ${direction}`, { sectionIndex }),
    speed: (rate: number) => log('info', 'SCHEDULER', `Speed set to ${rate}`),
    completed: (position: number) => log('info', 'SCHEDULER', `Reached end of document`, { position }),
    error: (message: string) => log('error', 'SCHEDULER', message),
    recovered: () => log('info', 'SCHEDULER', `Recovered from error`),
  },
  interjection: {
    scheduled: (type: string) => log('debug', 'INTERJECTION', `Pending ${type}`),
    inserted: (text: string) => log('info', 'INTERJECTION', `Announcing "${text}"`),
    tone: (cue: string) => log('debug', 'INTERJECTION', `Tone cue ${cue}`),
  },
  engine: {
    init: (name: string) => log('info', 'ENGINE', `Initialized ${name}`),
    error: (name: string, error: string) => log('error', 'ENGINE', `${name} error: ${error}`),
  },
};
