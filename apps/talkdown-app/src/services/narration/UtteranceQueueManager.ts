import { CircularBuffer } from './CircularBuffer';
import { narrationLogger } from './logger';
import { QueuePriority, Utterance, UtterancePerformance, UtteranceTelemetry } from './types';
import { toTelemetry, withPerformance } from './utterance';

const DEFAULT_RECYCLE_CAPACITY = 10;
const DEFAULT_CONTEXT_REPLAY_DEPTH = 3;

/**
 * Owns the forward playback queue and the recycle buffer of completed
 * utterances. Not reentrant: callers serialize access.
 */
export class UtteranceQueueManager {
  #queue: Utterance[] = [];
  #recycle: CircularBuffer<Utterance>;
  #recycleCapacity: number;
  #contextReplayDepth: number;

  constructor(
    recycleCapacity = DEFAULT_RECYCLE_CAPACITY,
    contextReplayDepth = DEFAULT_CONTEXT_REPLAY_DEPTH,
  ) {
    this.#recycleCapacity = recycleCapacity;
    this.#contextReplayDepth = contextReplayDepth;
    this.#recycle = new CircularBuffer<Utterance>(recycleCapacity);
  }

  enqueue(utterance: Utterance): boolean {
    if (this.#isDuplicate(utterance)) {
      narrationLogger.queue.duplicate(utterance.startPosition, utterance.endPosition);
      return false;
    }
    this.#queue.push(utterance);
    narrationLogger.queue.append(utterance.startPosition, utterance.endPosition);
    return true;
  }

  enqueueMany(utterances: Utterance[]): number {
    let added = 0;
    for (const utterance of utterances) {
      if (this.#isDuplicate(utterance)) {
        narrationLogger.queue.duplicate(utterance.startPosition, utterance.endPosition);
        continue;
      }
      this.#queue.push(utterance);
      added++;
    }
    narrationLogger.queue.appendMany(added);
    return added;
  }

  /**
   * Puts the utterance ahead of everything pending. Only interjection and
   * higher priorities preempt; anything lower is appended instead. A range
   * that is already pending is refused either way.
   */
  insertAtFront(utterance: Utterance): boolean {
    if (utterance.priority < QueuePriority.Interjection) {
      narrationLogger.queue.demoted(utterance.priority);
      return this.enqueue(utterance);
    }
    if (this.#isDuplicate(utterance)) {
      narrationLogger.queue.duplicate(utterance.startPosition, utterance.endPosition);
      return false;
    }
    this.#queue.unshift(utterance);
    narrationLogger.queue.insertFront(utterance.priority);
    return true;
  }

  dequeueNext(): Utterance | null {
    const next = this.#queue.shift();
    if (!next) return null;
    narrationLogger.queue.dequeue(next.startPosition, next.endPosition);
    return next;
  }

  peekNext(): Utterance | null {
    return this.#queue[0] ?? null;
  }

  lastQueued(): Utterance | null {
    return this.#queue[this.#queue.length - 1] ?? null;
  }

  moveToRecycle(utterance: Utterance, performance: UtterancePerformance): void {
    this.#recycle.append(withPerformance(utterance, performance));
    narrationLogger.queue.recycle(
      utterance.startPosition,
      utterance.endPosition,
      performance.actualDuration,
    );
  }

  /**
   * Walks the recycle buffer newest → oldest until the accumulated measured
   * duration covers `seconds`. The slice comes back oldest first.
   */
  findReplayUtterances(seconds: number): Utterance[] | null {
    const replay: Utterance[] = [];
    let accumulated = 0;

    for (const utterance of this.#recycle.reversed()) {
      if (!utterance.performance) continue;
      replay.unshift(utterance);
      accumulated += utterance.performance.actualDuration;
      if (accumulated >= seconds) break;
    }

    return replay.length > 0 ? replay : null;
  }

  lastMainContentUtterance(): Utterance | null {
    return this.#recycle.reversed().find((u) => !u.isInterjection) ?? null;
  }

  contextReplayUtterances(depth = this.#contextReplayDepth): Utterance[] {
    if (depth <= 0) return [];
    const main = this.#recycle.elements.filter((u) => !u.isInterjection);
    return main.slice(-depth);
  }

  recycledPerformance(): UtteranceTelemetry[] {
    return this.#recycle.elements
      .map(toTelemetry)
      .filter((t): t is UtteranceTelemetry => t !== null);
  }

  /** Keeps the recycle buffer so a rewind can still replay instantly. */
  clearMainQueue(): void {
    this.#queue = [];
    narrationLogger.queue.clear();
  }

  resetAll(): void {
    this.#queue = [];
    this.#recycle = new CircularBuffer<Utterance>(this.#recycleCapacity);
    narrationLogger.queue.reset();
  }

  get queueDepth(): number {
    return this.#queue.length;
  }

  get recycleDepth(): number {
    return this.#recycle.size;
  }

  get isMainQueueEmpty(): boolean {
    return this.#queue.length === 0;
  }

  get hasRecycledContent(): boolean {
    return !this.#recycle.isEmpty;
  }

  #isDuplicate(utterance: Utterance): boolean {
    if (utterance.isInterjection) return false;
    return this.#queue.some(
      (queued) =>
        !queued.isInterjection &&
        queued.startPosition === utterance.startPosition &&
        queued.endPosition === utterance.endPosition,
    );
  }
}
