export type ContentSectionKind = 'header' | 'paragraph' | 'codeBlock' | 'list' | 'blockquote';

export interface ContentSection {
  startIndex: number;
  endIndex: number;
  kind: ContentSectionKind;
  level?: number;
  skippable: boolean;
  fence?: string; // opening fence line of a code block, e.g. "```python"
  terminated?: boolean; // false when the closing fence was never found
}

export interface NarrationDocument {
  text: string;
  sections: ContentSection[];
  resumePosition?: number;
  elapsed?: number; // seconds already listened, restored from storage
}

export enum QueuePriority {
  Background = 0,
  Normal = 1,
  Interjection = 2,
  Urgent = 3,
  Critical = 4,
}

export type VoiceVariant = 'main' | 'announcement';

export type InterjectionEvent =
  | { type: 'codeBlockStart'; language: string | null; sectionIndex: number }
  | { type: 'codeBlockEnd'; sectionIndex: number }
  | { type: 'assistantInsight'; text: string; context: string }
  | { type: 'userQuestion'; query: string }
  | { type: 'contextualHelp'; topic: string };

export interface UtteranceMetadata {
  contentKind: ContentSectionKind | 'announcement';
  language?: string;
  isSkippable: boolean;
  pendingAnnouncements: InterjectionEvent[];
}

export interface UtterancePerformance {
  actualDuration: number; // seconds
  charactersPerSecond: number;
  completedAt: number; // epoch ms
}

export interface Utterance {
  id: string;
  text: string;
  startPosition: number;
  endPosition: number;
  sectionIndex: number;
  isInterjection: boolean;
  priority: QueuePriority;
  voice: VoiceVariant;
  metadata: UtteranceMetadata;
  performance?: UtterancePerformance;
}

export type PlaybackState = 'idle' | 'preparing' | 'playing' | 'paused' | 'error';

export type FeedbackCue =
  | 'playStarted'
  | 'playPaused'
  | 'playStopped'
  | 'playCompleted'
  | 'sectionChanged'
  | 'codeBlockStart'
  | 'codeBlockEnd'
  | 'error';

export interface NarrationSnapshot {
  state: PlaybackState;
  position: number;
  sectionIndex: number;
  speed: number;
  isCompleted: boolean;
  queueDepth: number;
  recycleDepth: number;
  totalElapsed: number;
  lastError: string | null;
}

export interface UtteranceTelemetry {
  id: string;
  startPosition: number;
  endPosition: number;
  isInterjection: boolean;
  actualDuration: number;
  charactersPerSecond: number;
  completedAt: number;
}

export interface SectionSignal {
  sectionIndex: number;
  kind: ContentSectionKind;
}

export interface NarrationEventMap {
  'state-change': NarrationSnapshot;
  'position-change': { position: number; sectionIndex: number };
  'section-enter': SectionSignal;
  'section-exit': SectionSignal;
  'interjection-played': { utterance: Utterance };
  'utterance-complete': UtteranceTelemetry;
  feedback: { cue: FeedbackCue };
  'playback-complete': { position: number; totalElapsed: number };
  'playback-error': { message: string; utteranceId: string | null };
}
