import type { InterjectionStyle } from './config';
import { narrationLogger } from './logger';
import type { FeedbackCue, InterjectionEvent, Utterance } from './types';
import type { UtteranceQueueManager } from './UtteranceQueueManager';
import { createAnnouncement } from './utterance';

export interface InterjectionOptions {
  style: InterjectionStyle;
  announceLanguage: boolean;
}

interface Placement {
  event: InterjectionEvent;
  position: number;
  sectionIndex: number;
}

/**
 * Decides which announcements go in between two utterances. Nothing here
 * ever interrupts speech in flight: announcements are only produced at a
 * boundary, after one utterance finished and before the next starts.
 */
export class InterjectionCoordinator {
  #options: InterjectionOptions;
  #onCue: (cue: FeedbackCue) => void;
  #pending: InterjectionEvent[] = [];
  #consumed = new WeakSet<InterjectionEvent>();

  constructor(options: InterjectionOptions, onCue: (cue: FeedbackCue) => void = () => {}) {
    this.#options = { ...options };
    this.#onCue = onCue;
  }

  configure(options: Partial<InterjectionOptions>): void {
    this.#options = { ...this.#options, ...options };
  }

  /** Holds an event until the next boundary. */
  request(event: InterjectionEvent): void {
    this.#pending.push(event);
    narrationLogger.interjection.scheduled(event.type);
  }

  get hasPending(): boolean {
    return this.#pending.length > 0;
  }

  /**
   * Called between utterances. Collects the finished utterance's exit
   * events, the pending requests and the upcoming utterance's entry events,
   * in that order, and inserts the spoken ones at the front of the queue.
   * Returns the inserted announcements in play order.
   */
  atBoundary(finished: Utterance | null, queue: UtteranceQueueManager): Utterance[] {
    const upcoming = queue.peekNext();
    const placements: Placement[] = [];

    if (finished) {
      for (const event of finished.metadata.pendingAnnouncements) {
        if (event.type === 'codeBlockEnd' && this.#claim(event)) {
          placements.push({
            event,
            position: finished.endPosition,
            sectionIndex: finished.sectionIndex,
          });
        }
      }
    }

    const anchor = upcoming ?? finished;
    const anchorPosition = upcoming ? upcoming.startPosition : (finished?.endPosition ?? 0);
    for (const event of this.#pending.splice(0)) {
      placements.push({ event, position: anchorPosition, sectionIndex: anchor?.sectionIndex ?? 0 });
    }

    if (upcoming && !upcoming.isInterjection) {
      for (const event of upcoming.metadata.pendingAnnouncements) {
        if (event.type === 'codeBlockStart' && this.#claim(event)) {
          placements.push({
            event,
            position: upcoming.startPosition,
            sectionIndex: upcoming.sectionIndex,
          });
        }
      }
    }

    const announcements: Utterance[] = [];
    for (const placement of placements) {
      const text = this.#resolve(placement.event);
      if (text === null) continue;
      announcements.push(
        createAnnouncement(text, placement.position, placement.sectionIndex, placement.event),
      );
    }

    for (let i = announcements.length - 1; i >= 0; i--) {
      const announcement = announcements[i];
      if (announcement) queue.insertAtFront(announcement);
    }
    for (const announcement of announcements) {
      narrationLogger.interjection.inserted(announcement.text);
    }
    return announcements;
  }

  reset(): void {
    this.#pending = [];
    this.#consumed = new WeakSet<InterjectionEvent>();
  }

  #claim(event: InterjectionEvent): boolean {
    if (this.#consumed.has(event)) return false;
    this.#consumed.add(event);
    return true;
  }

  // spoken text for an event, or null when the style only calls for a tone
  #resolve(event: InterjectionEvent): string | null {
    const { style, announceLanguage } = this.#options;
    switch (event.type) {
      case 'codeBlockStart': {
        if (style === 'tonesOnly' || style === 'both') this.#cue('codeBlockStart');
        if (style === 'tonesOnly') return null;
        return event.language && announceLanguage ? `${event.language} code` : 'code block';
      }
      case 'codeBlockEnd':
        if (style !== 'voiceOnly') this.#cue('codeBlockEnd');
        return null;
      case 'assistantInsight':
        return event.text;
      case 'userQuestion':
        return `Question: ${event.query}`;
      case 'contextualHelp':
        return `Help: ${event.topic}`;
    }
  }

  #cue(cue: FeedbackCue): void {
    narrationLogger.interjection.tone(cue);
    this.#onCue(cue);
  }
}
