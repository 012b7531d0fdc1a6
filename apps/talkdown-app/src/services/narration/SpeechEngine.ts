import type { VoiceVariant } from './types';

export interface SpeechRequest {
  id: string;
  text: string;
  voice: VoiceVariant;
  voiceId?: string;
  rate: number;
  pitch: number;
  volume: number;
}

/**
 * Callbacks the engine reports through. Every callback may arrive after the
 * request was stopped; the receiver decides whether it is stale.
 */
export interface SpeechEngineListener {
  onStart(id: string): void;
  onFinish(id: string, actualDuration: number): void;
  onError(id: string, error: Error): void;
}

/**
 * The synthesis primitive. `speak` returns immediately and reports progress
 * asynchronously through the listener.
 */
export interface SpeechEngine {
  name: string;
  initialized: boolean;
  init(): Promise<boolean>;
  setListener(listener: SpeechEngineListener | null): void;
  speak(request: SpeechRequest): void;
  pause(): boolean;
  resume(): boolean;
  stop(): void;
  setVolume?(volume: number): void;
  shutdown(): Promise<void>;
}
