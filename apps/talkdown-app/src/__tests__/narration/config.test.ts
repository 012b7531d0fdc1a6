import { describe, test, expect } from 'vitest';
import {
  DEFAULT_NARRATION_CONFIG,
  parseNarrationConfig,
} from '@/services/narration/config';
import { InvalidNarrationConfigError } from '@/services/narration/errors';

describe('narration config', () => {
  test('should fill every default', () => {
    const config = parseNarrationConfig();
    expect(config.chunking).toEqual({ targetChunkSize: 200, maxChunkSize: 300 });
    expect(config.lookaheadThreshold).toBe(2);
    expect(config.chunkBatchSize).toBe(4);
    expect(config.recycleCapacity).toBe(10);
    expect(config.speed).toEqual({ initial: 1, min: 0.5, max: 2 });
    expect(config.errorRecoveryMs).toBe(1500);
    expect(config.interjections).toEqual({ style: 'smartDetection', announceLanguage: true });
    expect(config.voices.announcement).toEqual({ pitch: 1, volume: 0.8, rateMultiplier: 1.1 });
  });

  test('should merge nested overrides with defaults', () => {
    const config = parseNarrationConfig({ speed: { initial: 1.5 }, voices: { main: { voiceId: 'alto' } } });
    expect(config.speed).toEqual({ initial: 1.5, min: 0.5, max: 2 });
    expect(config.voices.main.voiceId).toBe('alto');
    expect(config.voices.main.volume).toBe(1);
  });

  test('should reject a max chunk size below the target', () => {
    try {
      parseNarrationConfig({ chunking: { targetChunkSize: 300, maxChunkSize: 200 } });
      expect.unreachable('config should not parse');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidNarrationConfigError);
      if (error instanceof InvalidNarrationConfigError) {
        expect(error.issues).toEqual(['chunking.maxChunkSize: must be at least targetChunkSize']);
      }
    }
  });

  test('should reject an inverted speed range', () => {
    expect(() => parseNarrationConfig({ speed: { min: 2, max: 1 } })).toThrow(
      'Invalid narration config: speed.min: must not exceed speed.max',
    );
  });

  test('should report the path of a field-level problem', () => {
    expect(() => parseNarrationConfig({ lookaheadThreshold: 0 })).toThrow(
      /lookaheadThreshold: /,
    );
  });

  test('should expose the parsed defaults', () => {
    expect(DEFAULT_NARRATION_CONFIG.fallbackWordsPerMinute).toBe(150);
    expect(DEFAULT_NARRATION_CONFIG.averageWordLength).toBe(5);
  });
});
