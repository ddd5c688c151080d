import { describe, expect, test, vi } from 'vitest';
import type { Browser } from 'playwright-core';
import { BrowserPool, type LaunchProfile } from '../../../src/sessions/BrowserPool.js';

function createMockBrowser() {
  return { close: vi.fn(async () => {}) };
}

const HEADED: LaunchProfile = { headless: false, slowmo: 80 };
const HEADLESS: LaunchProfile = { headless: true, slowmo: 0 };

describe('BrowserPool', () => {
  test('profile keys combine headless and slowmo', () => {
    expect(BrowserPool.profileKey(HEADED)).toBe('false:80');
  });

  test('shares one browser per profile and closes it on last release', async () => {
    const browsers: Array<ReturnType<typeof createMockBrowser>> = [];
    const launcher = vi.fn(async () => {
      const browser = createMockBrowser();
      browsers.push(browser);
      return browser as unknown as Browser;
    });
    const pool = new BrowserPool(launcher);

    const [a, b] = await Promise.all([pool.acquire(HEADED), pool.acquire(HEADED)]);
    await pool.acquire(HEADLESS);

    expect(a).toBe(b);
    expect(launcher).toHaveBeenCalledTimes(2);
    expect(pool.size).toBe(2);
    expect(pool.refCount(HEADED)).toBe(2);

    await pool.release(HEADED);
    expect(browsers[0]?.close).not.toHaveBeenCalled();
    await pool.release(HEADED);
    expect(browsers[0]?.close).toHaveBeenCalledTimes(1);
    expect(pool.refCount(HEADED)).toBe(0);

    await pool.closeAll();
    expect(browsers[1]?.close).toHaveBeenCalledTimes(1);
    expect(pool.size).toBe(0);
  });

  test('a failed launch leaves no entry behind', async () => {
    const pool = new BrowserPool(async () => {
      throw new Error('no chromium');
    });

    await expect(pool.acquire(HEADED)).rejects.toThrow('no chromium');
    expect(pool.size).toBe(0);
    expect(pool.refCount(HEADED)).toBe(0);
  });

  test('releasing an unknown profile is a no-op', async () => {
    const pool = new BrowserPool(async () => createMockBrowser() as unknown as Browser);
    await expect(pool.release(HEADLESS)).resolves.toBeUndefined();
  });
});
