import { nanoid } from 'nanoid';
import {
  InterjectionEvent,
  QueuePriority,
  Utterance,
  UtteranceMetadata,
  UtterancePerformance,
  UtteranceTelemetry,
} from './types';

export interface CreateUtteranceOptions {
  text: string;
  startPosition: number;
  endPosition: number;
  sectionIndex: number;
  metadata: UtteranceMetadata;
  priority?: QueuePriority;
}

export function createUtterance(opts: CreateUtteranceOptions): Utterance {
  return {
    id: nanoid(10),
    text: opts.text,
    startPosition: opts.startPosition,
    endPosition: opts.endPosition,
    sectionIndex: opts.sectionIndex,
    isInterjection: false,
    priority: opts.priority ?? QueuePriority.Normal,
    voice: 'main',
    metadata: opts.metadata,
  };
}

/**
 * Announcements sit at the position of the content they precede and have a
 * zero-width range, so they never move the read position.
 */
export function createAnnouncement(
  text: string,
  position: number,
  sectionIndex: number,
  event: InterjectionEvent,
): Utterance {
  return {
    id: nanoid(10),
    text,
    startPosition: position,
    endPosition: position,
    sectionIndex,
    isInterjection: true,
    priority: QueuePriority.Interjection,
    voice: 'announcement',
    metadata: {
      contentKind: 'announcement',
      isSkippable: false,
      pendingAnnouncements: [event],
    },
  };
}

export function withPerformance(utterance: Utterance, performance: UtterancePerformance): Utterance {
  return { ...utterance, performance };
}

// replayed copies get a fresh id so a late completion for the replaced utterance cannot match them
export function asReplay(utterance: Utterance, priority = QueuePriority.Urgent): Utterance {
  const { performance: _performance, ...rest } = utterance;
  return { ...rest, id: nanoid(10), priority };
}

export function measurePerformance(
  utterance: Utterance,
  actualDuration: number,
  completedAt = Date.now(),
): UtterancePerformance {
  const duration = Number.isFinite(actualDuration) && actualDuration > 0 ? actualDuration : 0;
  return {
    actualDuration: duration,
    charactersPerSecond: duration > 0 ? utterance.text.length / duration : 0,
    completedAt,
  };
}

export function toTelemetry(utterance: Utterance): UtteranceTelemetry | null {
  if (!utterance.performance) return null;
  return {
    id: utterance.id,
    startPosition: utterance.startPosition,
    endPosition: utterance.endPosition,
    isInterjection: utterance.isInterjection,
    ...utterance.performance,
  };
}
