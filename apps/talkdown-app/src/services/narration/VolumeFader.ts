const STEP_MS = 50;

/**
 * Ramps a volume setter between two levels. Only one fade runs at a time:
 * starting a new one cancels the previous.
 */
export class VolumeFader {
  #timer: ReturnType<typeof setInterval> | null = null;

  get isFading(): boolean {
    return this.#timer !== null;
  }

  fade(
    setVolume: (volume: number) => void,
    from: number,
    to: number,
    durationMs: number,
    onComplete?: () => void,
  ): void {
    this.cancel();

    const steps = Math.max(1, Math.round(durationMs / STEP_MS));
    if (durationMs <= 0) {
      setVolume(to);
      onComplete?.();
      return;
    }

    let step = 0;
    setVolume(from);
    this.#timer = setInterval(() => {
      step++;
      if (step >= steps) {
        this.cancel();
        setVolume(to);
        onComplete?.();
        return;
      }
      setVolume(from + ((to - from) * step) / steps);
    }, STEP_MS);
  }

  cancel(): void {
    if (this.#timer) {
      clearInterval(this.#timer);
      this.#timer = null;
    }
  }
}
