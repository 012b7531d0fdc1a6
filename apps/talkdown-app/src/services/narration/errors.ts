export class SpeechEngineError extends Error {
  constructor(
    message: string,
    public utteranceId: string | null,
  ) {
    super(`[Speech Engine] ${message}`);
    this.name = 'SpeechEngineError';
  }
}

export class InvalidNarrationConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid narration config: ${issues.join('; ')}`);
    this.name = 'InvalidNarrationConfigError';
  }
}
