import type { SpeechEngine, SpeechEngineListener, SpeechRequest } from '@/services/narration/SpeechEngine';
import { createUtterance } from '@/services/narration/utterance';
import { ContentSection, QueuePriority, Utterance } from '@/services/narration/types';

export function makeUtterance(
  startPosition: number,
  endPosition: number,
  extra: Partial<Utterance> = {},
): Utterance {
  return {
    ...createUtterance({
      text: `text ${startPosition}-${endPosition}`,
      startPosition,
      endPosition,
      sectionIndex: 0,
      metadata: { contentKind: 'paragraph', isSkippable: false, pendingAnnouncements: [] },
    }),
    ...extra,
  };
}

export function makeInterjection(position: number, text = 'note'): Utterance {
  return makeUtterance(position, position, {
    text,
    isInterjection: true,
    priority: QueuePriority.Interjection,
    voice: 'announcement',
  });
}

export function section(
  startIndex: number,
  endIndex: number,
  kind: ContentSection['kind'] = 'paragraph',
  extra: Partial<ContentSection> = {},
): ContentSection {
  return { startIndex, endIndex, kind, skippable: kind === 'codeBlock', ...extra };
}

/** Records requests; tests drive completion by hand. */
export class RecordingSpeechEngine implements SpeechEngine {
  name = 'recording';
  initialized = true;
  requests: SpeechRequest[] = [];
  stopCount = 0;
  canPause = true;
  canResume = true;
  volumes: number[] = [];
  listener: SpeechEngineListener | null = null;

  async init(): Promise<boolean> {
    return true;
  }

  setListener(listener: SpeechEngineListener | null): void {
    this.listener = listener;
  }

  speak(request: SpeechRequest): void {
    this.requests.push(request);
    this.listener?.onStart(request.id);
  }

  pause(): boolean {
    return this.canPause;
  }

  resume(): boolean {
    return this.canResume;
  }

  stop(): void {
    this.stopCount++;
  }

  setVolume(volume: number): void {
    this.volumes.push(volume);
  }

  async shutdown(): Promise<void> {
    this.listener = null;
  }

  get lastRequest(): SpeechRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  get spokenTexts(): string[] {
    return this.requests.map((r) => r.text);
  }

  finish(duration = 1): void {
    const request = this.lastRequest;
    if (request) this.listener?.onFinish(request.id, duration);
  }

  fail(message = 'voice unavailable'): void {
    const request = this.lastRequest;
    if (request) this.listener?.onError(request.id, new Error(message));
  }
}
