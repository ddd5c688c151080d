/**
 * BrowserPool: reference-counted Chromium instances keyed by launch profile.
 *
 * The first acquire for a profile launches the browser; the last release
 * closes it. Sessions never close a browser directly.
 */

import { existsSync } from 'fs';
import { delimiter, join } from 'path';
import { chromium, type Browser, type BrowserContext } from 'playwright-core';
import { getEnv } from '../config/env.js';
import { getLogger } from '../monitoring/logger.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface LaunchProfile {
  headless: boolean;
  slowmo: number;
}

export type BrowserLauncher = (profile: LaunchProfile) => Promise<Browser>;

interface PoolEntry {
  browser: Promise<Browser>;
  refs: number;
}

// ── Launching ────────────────────────────────────────────────────────────

const CHROMIUM_BINARIES = ['chromium', 'chromium-browser', 'google-chrome', 'google-chrome-stable'];

/** Explicit executable from the environment, else the first Chromium on PATH. */
export function chromiumExecutablePath(): string | undefined {
  const explicit = getEnv().PLAYWRIGHT_CHROMIUM_EXECUTABLE_PATH?.trim();
  if (explicit) return explicit;
  const dirs = (process.env.PATH ?? '').split(delimiter).filter(Boolean);
  for (const binary of CHROMIUM_BINARIES) {
    for (const dir of dirs) {
      const candidate = join(dir, binary);
      if (existsSync(candidate)) return candidate;
    }
  }
  return undefined;
}

export const launchChromium: BrowserLauncher = (profile) =>
  chromium.launch({
    headless: profile.headless,
    slowMo: profile.slowmo,
    executablePath: chromiumExecutablePath(),
  });

export const ACCEPT_LANGUAGE = 'es-ES,es;q=0.9,en;q=0.8';

/** Isolated context: downloads accepted, desktop UA, Spanish locale. */
export function newAutofillContext(browser: Browser): Promise<BrowserContext> {
  const env = getEnv();
  return browser.newContext({
    acceptDownloads: true,
    userAgent: env.AUTOFILL_USER_AGENT,
    locale: env.AUTOFILL_LOCALE,
    extraHTTPHeaders: { 'Accept-Language': ACCEPT_LANGUAGE },
  });
}

// ── Pool ─────────────────────────────────────────────────────────────────

export class BrowserPool {
  private entries = new Map<string, PoolEntry>();
  private readonly log = getLogger().child({ component: 'BrowserPool' });

  constructor(private readonly launcher: BrowserLauncher = launchChromium) {}

  static profileKey(profile: LaunchProfile): string {
    return `${profile.headless}:${profile.slowmo}`;
  }

  /** Number of live browsers. */
  get size(): number {
    return this.entries.size;
  }

  refCount(profile: LaunchProfile): number {
    return this.entries.get(BrowserPool.profileKey(profile))?.refs ?? 0;
  }

  async acquire(profile: LaunchProfile): Promise<Browser> {
    const key = BrowserPool.profileKey(profile);
    let entry = this.entries.get(key);
    if (!entry) {
      this.log.info('Launching browser', { profile: key });
      entry = { browser: this.launcher(profile), refs: 0 };
      this.entries.set(key, entry);
    }
    entry.refs++;
    try {
      return await entry.browser;
    } catch (err) {
      entry.refs--;
      if (this.entries.get(key) === entry) this.entries.delete(key);
      throw err;
    }
  }

  async release(profile: LaunchProfile): Promise<void> {
    const key = BrowserPool.profileKey(profile);
    const entry = this.entries.get(key);
    if (!entry) return;
    entry.refs--;
    if (entry.refs > 0) return;
    this.entries.delete(key);
    const browser = await entry.browser;
    this.log.info('Closing idle browser', { profile: key });
    await browser.close();
  }

  async closeAll(): Promise<void> {
    const entries = [...this.entries.values()];
    this.entries.clear();
    for (const entry of entries) {
      const browser = await entry.browser;
      await browser.close();
    }
  }
}
