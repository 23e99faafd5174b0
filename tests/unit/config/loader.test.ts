import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  deepMerge,
  loadConfig,
  parseConfig,
  toThresholdConfig,
} from '../../../src/config/loader.js';
import { DEFAULT_THRESHOLDS } from '../../../src/config/defaults.js';
import { TriageError } from '../../../src/api/errors.js';

function captureError(fn: () => unknown): TriageError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TriageError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a TriageError');
}

describe('Config Loader', () => {
  describe('deepMerge', () => {
    it('should merge nested objects and replace scalars', () => {
      const merged = deepMerge(
        { analysis: { format: 'md', tail_window_minutes: 30 }, thresholds: { min_samples: 5 } },
        { analysis: { format: 'txt' } }
      );
      expect(merged).toEqual({
        analysis: { format: 'txt', tail_window_minutes: 30 },
        thresholds: { min_samples: 5 },
      });
    });

    it('should ignore undefined source values', () => {
      expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
    });
  });

  describe('parseConfig', () => {
    const text = yaml.dump({
      thresholds: { old_trend_threshold: 4 },
      analysis: { format: 'md' },
      environments: {
        production: { analysis: { format: 'txt' }, thresholds: { long_pause_ms: 500 } },
      },
    });

    it('should apply the selected environment section', () => {
      expect(parseConfig(text, 'production')).toEqual({
        thresholds: { old_trend_threshold: 4, long_pause_ms: 500 },
        analysis: { format: 'txt' },
      });
      expect(parseConfig(text, 'development')).toEqual({
        thresholds: { old_trend_threshold: 4 },
        analysis: { format: 'md' },
      });
    });

    it('should treat an empty document as defaults', () => {
      expect(parseConfig('', 'test')).toEqual({ thresholds: {}, analysis: {} });
    });

    it('should reject values out of range', () => {
      const error = captureError(() => parseConfig('thresholds:\n  long_pause_ms: -5\n', 'test'));
      expect(error.code).toBe('InvalidConfig');
      expect(error.message).toBe(
        "Validation error on field 'thresholds.long_pause_ms': Long pause threshold must be positive"
      );
    });

    it('should reject unknown keys', () => {
      const error = captureError(() => parseConfig('thresholds:\n  bogus: 1\n', 'test'));
      expect(error.code).toBe('InvalidConfig');
      expect(error.details?.field).toBe('thresholds');
    });

    it('should accept only known report formats', () => {
      expect(parseConfig('analysis:\n  format: json\n', 'test').analysis.format).toBe('json');

      const error = captureError(() => parseConfig('analysis:\n  format: html\n', 'test'));
      expect(error.code).toBe('InvalidConfig');
      expect(error.details?.field).toBe('analysis.format');
    });

    it('should reject a document that is not a mapping', () => {
      const error = captureError(() => parseConfig('- a\n- b\n', 'test', 'list.yaml'));
      expect(error.message).toBe('Configuration in list.yaml must be a mapping');
    });

    it('should report YAML syntax errors', () => {
      const error = captureError(() => parseConfig('thresholds: [1, 2\n', 'test'));
      expect(error.code).toBe('InvalidConfig');
      expect(error.message.startsWith('Failed to parse <inline>:')).toBe(true);
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'gc-triage-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should load an explicit file', () => {
      const path = join(dir, 'triage.yaml');
      writeFileSync(path, 'analysis:\n  tail_window_minutes: 15\n');

      expect(loadConfig({ configPath: path, environment: 'test' })).toEqual({
        thresholds: {},
        analysis: { tail_window_minutes: 15 },
      });
    });

    it('should fail when an explicit file is missing', () => {
      const path = join(dir, 'missing.yaml');
      const error = captureError(() => loadConfig({ configPath: path }));
      expect(error.code).toBe('InvalidConfig');
      expect(error.message).toBe(`Configuration file not found: ${path}`);
    });

    it('should load the shipped configuration', () => {
      const config = loadConfig({ environment: 'production' });
      expect(config.analysis).toEqual({ tail_window_minutes: null, format: 'txt' });
      expect(toThresholdConfig(config)).toEqual(DEFAULT_THRESHOLDS);
    });
  });

  describe('toThresholdConfig', () => {
    it('should fill missing keys from the defaults', () => {
      const thresholds = toThresholdConfig({
        thresholds: { old_trend_threshold: 2.5, min_mixed_cycles: 0 },
        analysis: {},
      });
      expect(thresholds).toEqual({ ...DEFAULT_THRESHOLDS, oldTrendThreshold: 2.5, minMixedCycles: 0 });
    });
  });
});
