import { SpeechEngineError } from './errors';
import { narrationLogger } from './logger';
import type { SpeechEngine, SpeechEngineListener, SpeechRequest } from './SpeechEngine';

export interface SimulatedSpeechOptions {
  charactersPerSecond: number;
  // lets tests and demos fail chosen requests
  shouldFail?: (request: SpeechRequest) => boolean;
}

const DEFAULT_OPTIONS: SimulatedSpeechOptions = {
  charactersPerSecond: 15,
};

/**
 * Timer-driven engine that "speaks" for as long as the text would take at
 * the requested rate. Used for dry runs and integration tests.
 */
export class SimulatedSpeechEngine implements SpeechEngine {
  name = 'simulated';
  initialized = false;

  #options: SimulatedSpeechOptions;
  #listener: SpeechEngineListener | null = null;
  #current: SpeechRequest | null = null;
  #timer: ReturnType<typeof setTimeout> | null = null;
  #remainingMs = 0;
  #totalMs = 0;
  #resumedAt = 0;
  #isPlaying = false;
  #volume = 1;

  constructor(options?: Partial<SimulatedSpeechOptions>) {
    this.#options = { ...DEFAULT_OPTIONS, ...options };
  }

  async init(): Promise<boolean> {
    this.initialized = true;
    narrationLogger.engine.init(this.name);
    return true;
  }

  setListener(listener: SpeechEngineListener | null): void {
    this.#listener = listener;
  }

  speak(request: SpeechRequest): void {
    this.#clearTimer();
    this.#current = request;

    if (this.#options.shouldFail?.(request)) {
      this.#timer = setTimeout(() => {
        this.#timer = null;
        this.#current = null;
        this.#listener?.onError(request.id, new SpeechEngineError('Synthesis failed', request.id));
      }, 0);
      return;
    }

    const rate = request.rate > 0 ? request.rate : 1;
    this.#totalMs = Math.round((request.text.length / (this.#options.charactersPerSecond * rate)) * 1000);
    this.#remainingMs = this.#totalMs;
    this.#listener?.onStart(request.id);
    this.#schedule();
  }

  pause(): boolean {
    if (!this.#current || !this.#isPlaying) return false;
    this.#clearTimer();
    this.#remainingMs = Math.max(0, this.#remainingMs - (Date.now() - this.#resumedAt));
    this.#isPlaying = false;
    return true;
  }

  resume(): boolean {
    if (!this.#current || this.#isPlaying) return false;
    this.#schedule();
    return true;
  }

  stop(): void {
    this.#clearTimer();
    this.#current = null;
    this.#isPlaying = false;
    this.#remainingMs = 0;
  }

  setVolume(volume: number): void {
    this.#volume = Math.max(0, Math.min(1, volume));
  }

  getVolume(): number {
    return this.#volume;
  }

  async shutdown(): Promise<void> {
    this.stop();
    this.#listener = null;
    this.initialized = false;
  }

  #schedule(): void {
    const request = this.#current;
    if (!request) return;
    this.#isPlaying = true;
    this.#resumedAt = Date.now();
    this.#timer = setTimeout(() => {
      this.#timer = null;
      this.#current = null;
      this.#isPlaying = false;
      this.#listener?.onFinish(request.id, this.#totalMs / 1000);
    }, this.#remainingMs);
  }

  #clearTimer(): void {
    if (this.#timer) {
      clearTimeout(this.#timer);
      this.#timer = null;
    }
  }
}
