export { PlaybackScheduler } from './services/narration/PlaybackScheduler';
export type { PlaybackSchedulerOptions } from './services/narration/PlaybackScheduler';
export { Chunker, extractCodeLanguage, findSentenceEnd, normalizeSections } from './services/narration/Chunker';
export type { ChunkingOptions } from './services/narration/Chunker';
export { CircularBuffer } from './services/narration/CircularBuffer';
export { UtteranceQueueManager } from './services/narration/UtteranceQueueManager';
export { InterjectionCoordinator } from './services/narration/InterjectionCoordinator';
export type { InterjectionOptions } from './services/narration/InterjectionCoordinator';
export { SimulatedSpeechEngine } from './services/narration/SimulatedSpeechEngine';
export type { SimulatedSpeechOptions } from './services/narration/SimulatedSpeechEngine';
export type { SpeechEngine, SpeechEngineListener, SpeechRequest } from './services/narration/SpeechEngine';
export { VolumeFader } from './services/narration/VolumeFader';
export {
  DEFAULT_NARRATION_CONFIG,
  NarrationConfigSchema,
  parseNarrationConfig,
} from './services/narration/config';
export type {
  InterjectionStyle,
  NarrationConfig,
  NarrationConfigInput,
  VoiceSettings,
} from './services/narration/config';
export { InvalidNarrationConfigError, SpeechEngineError } from './services/narration/errors';
export { createAnnouncement, createUtterance } from './services/narration/utterance';
export { createNarrationStore } from './store/narrationStore';
export type { NarrationStore } from './store/narrationStore';
export { QueuePriority } from './services/narration/types';
export type {
  ContentSection,
  ContentSectionKind,
  FeedbackCue,
  InterjectionEvent,
  NarrationDocument,
  NarrationEventMap,
  NarrationSnapshot,
  PlaybackState,
  SectionSignal,
  Utterance,
  UtteranceMetadata,
  UtterancePerformance,
  UtteranceTelemetry,
  VoiceVariant,
} from './services/narration/types';
