import { afterEach, describe, expect, test, vi } from 'vitest';
import {
  getEnv,
  isDebugCaptureEnabled,
  resetEnv,
  shouldSaveScreenshots,
  shouldSaveScreenshotsOnError,
} from '../../../src/config/env.js';

afterEach(() => {
  vi.unstubAllEnvs();
  resetEnv();
});

describe('getEnv', () => {
  test('reads overrides from process.env', () => {
    vi.stubEnv('AUTOFILL_TABLE_PREFIX', '');
    vi.stubEnv('PROBE_TIMEOUT_MS', '1500');
    resetEnv();
    const env = getEnv();
    expect(env.AUTOFILL_TABLE_PREFIX).toBe('');
    expect(env.PROBE_TIMEOUT_MS).toBe(1500);
  });

  test('caches until reset', () => {
    vi.stubEnv('AUTOFILL_LOCALE', 'es-ES');
    resetEnv();
    const first = getEnv();
    vi.stubEnv('AUTOFILL_LOCALE', 'ca-ES');
    expect(getEnv()).toBe(first);
    resetEnv();
    expect(getEnv().AUTOFILL_LOCALE).toBe('ca-ES');
  });

  test('rejects a non-numeric probe timeout', () => {
    vi.stubEnv('PROBE_TIMEOUT_MS', 'soon');
    resetEnv();
    expect(() => getEnv()).toThrow();
  });
});

describe('artifact flags', () => {
  test('screenshots need debug capture as well', () => {
    vi.stubEnv('TEMPLATE_DEBUG_CAPTURE', 'no');
    vi.stubEnv('SAVE_ARTIFACT_SCREENSHOTS', 'yes');
    resetEnv();
    expect(isDebugCaptureEnabled()).toBe(false);
    expect(shouldSaveScreenshots()).toBe(false);
  });

  test('truthy spellings are case-insensitive', () => {
    vi.stubEnv('TEMPLATE_DEBUG_CAPTURE', ' ON ');
    vi.stubEnv('SAVE_ARTIFACT_SCREENSHOTS', 'True');
    vi.stubEnv('SAVE_ARTIFACT_SCREENSHOTS_ON_ERROR', '0');
    resetEnv();
    expect(shouldSaveScreenshots()).toBe(true);
    expect(shouldSaveScreenshotsOnError()).toBe(false);
  });

  test('blank values fall back to the default', () => {
    vi.stubEnv('TEMPLATE_DEBUG_CAPTURE', '1');
    vi.stubEnv('SAVE_ARTIFACT_SCREENSHOTS_ON_ERROR', '  ');
    resetEnv();
    expect(shouldSaveScreenshotsOnError()).toBe(true);
  });
});
