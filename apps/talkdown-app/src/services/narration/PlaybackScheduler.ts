import { createNarrationStore, NarrationStore } from '@/store/narrationStore';
import { Chunker } from './Chunker';
import { NarrationConfig, NarrationConfigInput, parseNarrationConfig } from './config';
import { SpeechEngineError } from './errors';
import { InterjectionCoordinator } from './InterjectionCoordinator';
import { narrationLogger } from './logger';
import type { SpeechEngine, SpeechRequest } from './SpeechEngine';
import {
  ContentSection,
  InterjectionEvent,
  NarrationDocument,
  NarrationEventMap,
  NarrationSnapshot,
  PlaybackState,
  QueuePriority,
  Utterance,
  UtteranceTelemetry,
  VoiceVariant,
} from './types';
import { UtteranceQueueManager } from './UtteranceQueueManager';
import { asReplay, measurePerformance, toTelemetry } from './utterance';
import { VolumeFader } from './VolumeFader';

export interface PlaybackSchedulerOptions {
  engine: SpeechEngine;
  config?: NarrationConfigInput;
  queue?: UtteranceQueueManager;
  coordinator?: InterjectionCoordinator;
  store?: NarrationStore;
}

const replayPriority = (utterance: Utterance) =>
  utterance.priority >= QueuePriority.Urgent ? utterance.priority : QueuePriority.Urgent;

/**
 * Drives the speech engine from the utterance queue. All state changes
 * happen inside command handlers and engine callbacks, one at a time; the
 * next utterance is started from within the completion callback of the
 * previous one so there is no gap between them.
 */
export class PlaybackScheduler extends EventTarget {
  readonly store: NarrationStore;
  readonly config: NarrationConfig;

  #engine: SpeechEngine;
  #queue: UtteranceQueueManager;
  #coordinator: InterjectionCoordinator;
  #chunker: Chunker | null = null;
  #fader = new VolumeFader();

  #state: PlaybackState = 'idle';
  #position = 0;
  #sectionIndex = 0;
  #enteredSection: number | null = null;
  #chunkCursor = 0;
  #speed: number;
  #voiceIds: Record<VoiceVariant, string | undefined>;
  #inFlight: Utterance | null = null;
  // finished while paused; its exit announcements still have to be placed
  #pendingBoundary: Utterance | null = null;
  #userStopped = false;
  // set when a seek cancels speech; absorbs one late completion reported without an id
  #seeking = false;
  #inSpeakCall = false;
  #isCompleted = false;
  #totalElapsed = 0;
  #lastError: string | null = null;
  #recoveryTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: PlaybackSchedulerOptions) {
    super();
    this.config = parseNarrationConfig(options.config);
    this.#engine = options.engine;
    this.#speed = this.#clampSpeed(this.config.speed.initial);
    this.#voiceIds = {
      main: this.config.voices.main.voiceId,
      announcement: this.config.voices.announcement.voiceId,
    };
    this.#queue =
      options.queue ??
      new UtteranceQueueManager(this.config.recycleCapacity, this.config.contextReplayDepth);
    this.#coordinator =
      options.coordinator ??
      new InterjectionCoordinator(this.config.interjections, (cue) => this.#emit('feedback', { cue }));
    this.store = options.store ?? createNarrationStore(this.#speed);

    this.#engine.setListener({
      onStart: (id) => this.#handleEngineStart(id),
      onFinish: (id, actualDuration) => this.onUtteranceFinished(actualDuration, id),
      onError: (id, error) => this.#handleEngineError(id, error),
    });
  }

  get state(): PlaybackState {
    return this.#state;
  }

  get currentPosition(): number {
    return this.#position;
  }

  get currentSectionIndex(): number {
    return this.#sectionIndex;
  }

  get speed(): number {
    return this.#speed;
  }

  get isCompleted(): boolean {
    return this.#isCompleted;
  }

  get totalElapsed(): number {
    return this.#totalElapsed;
  }

  get currentUtterance(): Utterance | null {
    return this.#inFlight;
  }

  get sections(): readonly ContentSection[] {
    return this.#chunker?.sections ?? [];
  }

  get snapshot(): NarrationSnapshot {
    return this.store.getState().snapshot;
  }

  telemetry(): UtteranceTelemetry[] {
    return this.#queue.recycledPerformance();
  }

  subscribe<K extends keyof NarrationEventMap>(
    type: K,
    handler: (detail: NarrationEventMap[K]) => void,
  ): () => void {
    const listener = (event: Event) => {
      if (event instanceof CustomEvent) handler(event.detail);
    };
    this.addEventListener(type, listener);
    return () => this.removeEventListener(type, listener);
  }

  load(document: NarrationDocument): void {
    this.#cancelInFlight();
    this.#clearRecovery();
    this.#fader.cancel();
    this.#queue.resetAll();
    this.#coordinator.reset();

    this.#chunker = new Chunker(document.text, document.sections, this.config.chunking);
    const textLength = this.#chunker.textLength;
    this.#position = this.#clampPosition(document.resumePosition ?? 0);
    this.#chunkCursor = this.#position;
    this.#sectionIndex = this.#sectionAt(this.#position);
    this.#enteredSection = null;
    this.#pendingBoundary = null;
    this.#totalElapsed = Math.max(0, document.elapsed ?? 0);
    this.#userStopped = false;
    this.#seeking = false;
    this.#isCompleted = false;
    this.#lastError = null;
    narrationLogger.scheduler.load(textLength, this.#position);

    this.#refill();
    if (this.#queue.isMainQueueEmpty) {
      this.#complete();
      return;
    }
    this.#setState('preparing');
  }

  play(): void {
    if (!this.#chunker) return;
    if (this.#state === 'playing' || this.#state === 'error') return;

    this.#userStopped = false;

    if (this.#state === 'paused' && this.#inFlight) {
      this.#resumeInFlight(this.#inFlight);
      return;
    }

    const boundary = this.#pendingBoundary;
    this.#pendingBoundary = null;
    if (!this.#startNext(boundary)) {
      this.#complete();
      return;
    }
    this.#emit('feedback', { cue: 'playStarted' });
  }

  pause(): void {
    if (this.#state !== 'playing') return;
    this.#fader.cancel();

    const inFlight = this.#inFlight;
    if (inFlight && !this.#engine.pause()) {
      // engine cannot hold mid-utterance: stop it and speak the unit again on resume
      this.#cancelInFlight();
      this.#queue.insertAtFront(asReplay(inFlight, replayPriority(inFlight)));
    }
    this.#setState('paused');
    this.#emit('feedback', { cue: 'playPaused' });
  }

  stop(): void {
    if (this.#state === 'idle' && !this.#inFlight) return;
    this.#userStopped = true;
    this.#seeking = false;
    this.#cancelInFlight();
    this.#clearRecovery();
    this.#fader.cancel();
    this.#queue.resetAll();
    this.#coordinator.reset();
    this.#pendingBoundary = null;
    this.#enteredSection = null;
    this.#chunkCursor = this.#position;
    this.#setState('idle');
    this.#emit('feedback', { cue: 'playStopped' });
  }

  /**
   * Completion of the in-flight utterance. Ignored when nothing is in
   * flight, after a stop, or when `utteranceId` names another utterance.
   * After a seek the first completion without an id is taken to belong to
   * the cancelled utterance and ignored too.
   */
  onUtteranceFinished(actualDuration: number, utteranceId?: string): void {
    if (utteranceId === undefined && this.#seeking) {
      this.#seeking = false;
      narrationLogger.scheduler.stale(utteranceId);
      return;
    }
    const finished = this.#inFlight;
    if (!finished || this.#userStopped || (utteranceId !== undefined && utteranceId !== finished.id)) {
      narrationLogger.scheduler.stale(utteranceId);
      return;
    }
    this.#inFlight = null;
    this.#seeking = false;

    const performance = measurePerformance(finished, actualDuration);
    this.#totalElapsed += performance.actualDuration;
    if (!finished.isInterjection) {
      this.#position = finished.endPosition;
      this.#chunkCursor = Math.max(this.#chunkCursor, finished.endPosition);
    }
    this.#queue.moveToRecycle(finished, performance);

    const telemetry = toTelemetry({ ...finished, performance });
    if (telemetry) this.#emit('utterance-complete', telemetry);
    if (finished.isInterjection) this.#emit('interjection-played', { utterance: finished });
    this.#emit('position-change', { position: this.#position, sectionIndex: this.#sectionIndex });

    if (this.#state === 'paused') {
      this.#pendingBoundary = finished;
      this.#sync();
      return;
    }
    if (!this.#startNext(finished)) {
      this.#complete();
    }
  }

  /**
   * Replays roughly the last `seconds` of audio from the recycle buffer.
   * Without enough measured history the position is estimated from the
   * fallback speaking rate and content is chunked again from there.
   */
  rewind(seconds: number): void {
    if (!this.#chunker || !Number.isFinite(seconds) || seconds <= 0) return;
    const wasPlaying = this.#state === 'playing';
    const inFlight = this.#inFlight;
    this.#cancelInFlight();
    this.#seeking = inFlight !== null;
    this.#pendingBoundary = null;

    const found = this.#queue.findReplayUtterances(seconds) ?? [];
    const covered = found.reduce((sum, u) => sum + (u.performance?.actualDuration ?? 0), 0);
    const replay = found.filter((u) => !u.isInterjection);
    const first = replay[0];

    if (first && covered >= seconds) {
      this.#requeueUnlessReplayed(inFlight, replay);
      this.#insertReplay(replay);
      this.#position = first.startPosition;
    } else {
      const rewindChars = Math.round(seconds * this.#averageCharactersPerSecond());
      this.#position = this.#clampPosition(this.#position - rewindChars);
      this.#queue.clearMainQueue();
      this.#chunkCursor = this.#position;
      this.#refill();
    }

    this.#isCompleted = false;
    this.#sectionIndex = this.#sectionAt(this.#position);
    narrationLogger.scheduler.rewind(seconds, first && covered >= seconds ? replay.length : 0, this.#position);
    this.#emit('position-change', { position: this.#position, sectionIndex: this.#sectionIndex });
    this.#resumeAfterJump(wasPlaying);
  }

  skipToNextSection(): void {
    if (!this.#chunker) return;
    const target = this.#sectionIndex + 1;
    if (target >= this.#chunker.sections.length) return;
    narrationLogger.scheduler.skip('next', target);
    this.#jumpToSection(target);
  }

  skipToPreviousSection(): void {
    if (!this.#chunker) return;
    const target = this.#sectionIndex - 1;
    if (target < 0) return;
    narrationLogger.scheduler.skip('previous', target);
    this.#jumpToSection(target);
  }

  /** Re-speaks the last few main-content utterances ahead of what is queued. */
  replayContext(depth = this.config.contextReplayDepth): number {
    return this.#replayFromHistory(this.#queue.contextReplayUtterances(depth));
  }

  repeatLast(): boolean {
    const last = this.#queue.lastMainContentUtterance();
    return last ? this.#replayFromHistory([last]) > 0 : false;
  }

  /** Takes effect from the next utterance started; the one in flight keeps its rate. */
  setSpeed(rate: number): void {
    if (!Number.isFinite(rate)) return;
    this.#speed = this.#clampSpeed(rate);
    narrationLogger.scheduler.speed(this.#speed);
    this.#sync();
  }

  setVoice(variant: VoiceVariant, voiceId: string | undefined): void {
    this.#voiceIds[variant] = voiceId;
  }

  /** The announcement is spoken at the next utterance boundary, never mid-utterance. */
  requestInterjection(event: InterjectionEvent): void {
    this.#coordinator.request(event);
  }

  async shutdown(): Promise<void> {
    this.stop();
    this.#engine.setListener(null);
    await this.#engine.shutdown();
  }

  #startNext(finished: Utterance | null): boolean {
    this.#refill();
    this.#coordinator.atBoundary(finished, this.#queue);
    const next = this.#queue.dequeueNext();
    if (!next) return false;
    this.#speak(next);
    return true;
  }

  #speak(utterance: Utterance): void {
    this.#inFlight = utterance;
    this.#isCompleted = false;

    if (!utterance.isInterjection) {
      this.#position = utterance.startPosition;
      this.#enterSection(utterance.sectionIndex);
    }

    const voice = this.config.voices[utterance.voice];
    const request: SpeechRequest = {
      id: utterance.id,
      text: utterance.text,
      voice: utterance.voice,
      voiceId: this.#voiceIds[utterance.voice],
      rate: this.#speed * voice.rateMultiplier,
      pitch: voice.pitch,
      volume: voice.volume,
    };

    narrationLogger.scheduler.start(utterance.id, utterance.startPosition, utterance.endPosition);
    this.#setState('playing');
    this.#sync();

    const nested = this.#inSpeakCall;
    this.#inSpeakCall = true;
    try {
      this.#engine.speak(request);
    } catch (error) {
      this.#handleEngineError(
        utterance.id,
        error instanceof Error ? error : new SpeechEngineError(String(error), utterance.id),
      );
    } finally {
      this.#inSpeakCall = nested;
    }
  }

  #resumeInFlight(inFlight: Utterance): void {
    if (this.#engine.resume()) {
      this.#setState('playing');
      this.#fadeIn(inFlight);
    } else {
      this.#cancelInFlight();
      this.#speak(asReplay(inFlight, replayPriority(inFlight)));
    }
    this.#emit('feedback', { cue: 'playStarted' });
  }

  #fadeIn(utterance: Utterance): void {
    const setVolume = this.#engine.setVolume?.bind(this.#engine);
    if (!setVolume || this.config.fadeInMs <= 0) return;
    const target = this.config.voices[utterance.voice].volume;
    this.#fader.fade(setVolume, 0, target, this.config.fadeInMs);
  }

  #jumpToSection(target: number): void {
    const section = this.#chunker?.sections[target];
    if (!section) return;
    const wasPlaying = this.#state === 'playing';

    this.#seeking = this.#inFlight !== null;
    this.#cancelInFlight();
    this.#queue.clearMainQueue();
    this.#pendingBoundary = null;
    this.#position = section.startIndex;
    this.#chunkCursor = section.startIndex;
    this.#sectionIndex = target;
    this.#isCompleted = false;
    this.#refill();

    this.#emit('position-change', { position: this.#position, sectionIndex: this.#sectionIndex });
    this.#resumeAfterJump(wasPlaying);
  }

  #replayFromHistory(history: Utterance[]): number {
    const first = history[0];
    if (!this.#chunker || !first) return 0;
    const wasPlaying = this.#state === 'playing';
    const inFlight = this.#inFlight;
    this.#cancelInFlight();
    this.#seeking = inFlight !== null;
    this.#pendingBoundary = null;

    this.#requeueUnlessReplayed(inFlight, history);
    this.#insertReplay(history);
    this.#position = first.startPosition;
    this.#sectionIndex = this.#sectionAt(this.#position);
    this.#isCompleted = false;

    this.#emit('position-change', { position: this.#position, sectionIndex: this.#sectionIndex });
    this.#resumeAfterJump(wasPlaying);
    return history.length;
  }

  // the interrupted utterance goes back behind the replay unless the replay already speaks its range
  #requeueUnlessReplayed(inFlight: Utterance | null, replay: Utterance[]): void {
    if (!inFlight) return;
    const replayed =
      !inFlight.isInterjection &&
      replay.some(
        (u) => u.startPosition === inFlight.startPosition && u.endPosition === inFlight.endPosition,
      );
    if (!replayed) this.#queue.insertAtFront(asReplay(inFlight, replayPriority(inFlight)));
  }

  // oldest-first input; inserted back to front so the oldest plays first
  #insertReplay(utterances: Utterance[]): void {
    for (let i = utterances.length - 1; i >= 0; i--) {
      const utterance = utterances[i];
      if (utterance) this.#queue.insertAtFront(asReplay(utterance, QueuePriority.Urgent));
    }
  }

  #resumeAfterJump(wasPlaying: boolean): void {
    if (wasPlaying) {
      if (!this.#startNext(null)) this.#complete();
      return;
    }
    this.#sync();
  }

  #refill(): void {
    if (!this.#chunker) return;
    if (this.#queue.queueDepth >= this.config.lookaheadThreshold) return;
    const batch = this.#chunker.nextUtterances(this.#chunkCursor, this.config.chunkBatchSize);
    const last = batch[batch.length - 1];
    if (!last) return;
    this.#chunkCursor = last.endPosition;
    this.#queue.enqueueMany(batch);
  }

  #complete(): void {
    this.#inFlight = null;
    this.#pendingBoundary = null;
    this.#isCompleted = true;
    narrationLogger.scheduler.completed(this.#position);
    if (this.#enteredSection !== null) {
      this.#emitSection('section-exit', this.#enteredSection);
      this.#enteredSection = null;
    }
    this.#setState('idle');
    this.#sync();
    this.#emit('feedback', { cue: 'playCompleted' });
    this.#emit('playback-complete', { position: this.#position, totalElapsed: this.#totalElapsed });
  }

  #cancelInFlight(): void {
    if (!this.#inFlight) return;
    // cleared first so a synchronous cancel callback from the engine is already stale
    this.#inFlight = null;
    this.#engine.stop();
  }

  #handleEngineStart(id: string): void {
    if (this.#inFlight?.id !== id) {
      narrationLogger.scheduler.stale(id);
      return;
    }
    // a start reported later than speak() means the cancelled request has settled
    if (!this.#inSpeakCall) this.#seeking = false;
  }

  #handleEngineError(id: string, error: Error): void {
    const failed = this.#inFlight;
    if (!failed || failed.id !== id) {
      narrationLogger.scheduler.stale(id);
      return;
    }
    this.#inFlight = null;
    this.#engine.stop();
    this.#queue.insertAtFront(asReplay(failed, replayPriority(failed)));

    this.#lastError = error.message;
    narrationLogger.engine.error(this.#engine.name, error.message);
    this.#setState('error');
    this.#emit('playback-error', { message: error.message, utteranceId: id });
    this.#emit('feedback', { cue: 'error' });

    this.#clearRecovery();
    this.#recoveryTimer = setTimeout(() => {
      this.#recoveryTimer = null;
      if (this.#state !== 'error') return;
      narrationLogger.scheduler.recovered();
      this.#setState('idle');
    }, this.config.errorRecoveryMs);
  }

  #clearRecovery(): void {
    if (this.#recoveryTimer) {
      clearTimeout(this.#recoveryTimer);
      this.#recoveryTimer = null;
    }
  }

  #enterSection(sectionIndex: number): void {
    this.#sectionIndex = sectionIndex;
    if (this.#enteredSection === sectionIndex) return;
    const previous = this.#enteredSection;
    this.#enteredSection = sectionIndex;
    if (previous !== null) {
      this.#emitSection('section-exit', previous);
      this.#emit('feedback', { cue: 'sectionChanged' });
    }
    this.#emitSection('section-enter', sectionIndex);
  }

  #emitSection(type: 'section-enter' | 'section-exit', sectionIndex: number): void {
    const section = this.#chunker?.sections[sectionIndex];
    if (section) this.#emit(type, { sectionIndex, kind: section.kind });
  }

  #sectionAt(position: number): number {
    if (!this.#chunker) return 0;
    const index = this.#chunker.sectionIndexAt(position);
    return index === -1 ? Math.max(0, this.#chunker.sections.length - 1) : index;
  }

  #averageCharactersPerSecond(): number {
    const measured = this.#queue
      .recycledPerformance()
      .filter((t) => !t.isInterjection && t.charactersPerSecond > 0);
    if (measured.length > 0) {
      return measured.reduce((sum, t) => sum + t.charactersPerSecond, 0) / measured.length;
    }
    const { fallbackWordsPerMinute, averageWordLength } = this.config;
    return ((fallbackWordsPerMinute * averageWordLength) / 60) * this.#speed;
  }

  #clampPosition(position: number): number {
    const length = this.#chunker?.textLength ?? 0;
    if (!Number.isFinite(position)) return 0;
    return Math.max(0, Math.min(length, Math.floor(position)));
  }

  #clampSpeed(rate: number): number {
    return Math.max(this.config.speed.min, Math.min(this.config.speed.max, rate));
  }

  #setState(next: PlaybackState): void {
    if (this.#state === next) return;
    narrationLogger.scheduler.state(this.#state, next);
    this.#state = next;
    this.#sync();
    this.#emit('state-change', this.snapshot);
  }

  #sync(): void {
    this.store.getState().setSnapshot({
      state: this.#state,
      position: this.#position,
      sectionIndex: this.#sectionIndex,
      speed: this.#speed,
      isCompleted: this.#isCompleted,
      queueDepth: this.#queue.queueDepth,
      recycleDepth: this.#queue.recycleDepth,
      totalElapsed: this.#totalElapsed,
      lastError: this.#lastError,
    });
  }

  #emit<K extends keyof NarrationEventMap>(type: K, detail: NarrationEventMap[K]): void {
    this.dispatchEvent(new CustomEvent(type, { detail }));
  }
}
