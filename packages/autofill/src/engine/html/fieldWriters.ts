/**
 * Field writers: best-effort setters over a live page.
 *
 * Each writer walks its candidate selectors in order and reports whether any
 * of them took the value. Hidden, disabled or missing elements are skipped;
 * a failing candidate is logged and the next one tried.
 */

import type { Locator, Page } from 'playwright-core';
import { normalizeAsciiUpper } from '../../canonical/normalizers.js';
import { errorMessage } from '../../errors.js';
import { getLogger } from '../../monitoring/logger.js';

interface OptionEntry {
  text: string;
  value: string;
}

async function usableLocator(page: Page, selector: string): Promise<Locator | null> {
  const loc = page.locator(selector).first();
  if ((await loc.count()) === 0) return null;
  if (!(await loc.isVisible())) return null;
  if (await loc.isDisabled()) return null;
  return loc;
}

function logSkip(writer: string, selector: string, err: unknown): void {
  getLogger().debug('Field writer candidate failed', { writer, selector, error: errorMessage(err) });
}

export async function setIfPossible(page: Page, selectors: string[], value: string): Promise<boolean> {
  if (!value) return false;
  for (const selector of selectors) {
    try {
      const loc = await usableLocator(page, selector);
      if (!loc) continue;
      await loc.fill(value);
      return true;
    } catch (err) {
      logSkip('fill', selector, err);
    }
  }
  return false;
}

/**
 * Option matching tiers: exact (case-insensitive) text or value, then
 * diacritic-insensitive equality, then substring. Returns the tier-best option.
 */
export function pickOption(options: OptionEntry[], desiredValue: string): OptionEntry | null {
  const desired = desiredValue.trim().toLowerCase();
  const desiredNorm = normalizeAsciiUpper(desiredValue);
  if (!desired) return null;

  const tiers: Array<(o: OptionEntry) => boolean> = [
    (o) => o.text.toLowerCase() === desired || o.value.toLowerCase() === desired,
    (o) => normalizeAsciiUpper(o.text) === desiredNorm || normalizeAsciiUpper(o.value) === desiredNorm,
    (o) =>
      o.text.toLowerCase().includes(desired) ||
      (o.value !== '' && o.value.toLowerCase().includes(desired)) ||
      (desiredNorm !== '' && normalizeAsciiUpper(o.text).includes(desiredNorm)) ||
      (desiredNorm !== '' && o.value !== '' && normalizeAsciiUpper(o.value).includes(desiredNorm)),
  ];
  for (const matches of tiers) {
    const hit = options.find(matches);
    if (hit) return hit;
  }
  return null;
}

async function chooseOption(loc: Locator, value: string): Promise<boolean> {
  const options = await loc.locator('option').evaluateAll((els) =>
    els.map((el) => ({
      text: (el.textContent ?? '').trim(),
      value: (el.getAttribute('value') ?? '').trim(),
    })),
  );
  const hit = pickOption(options, value);
  if (!hit) return false;
  if (hit.value) await loc.selectOption({ value: hit.value });
  else await loc.selectOption({ label: hit.text });
  return true;
}

export async function selectIfPossible(page: Page, selectors: string[], value: string): Promise<boolean> {
  if (!value) return false;
  for (const selector of selectors) {
    try {
      const loc = await usableLocator(page, selector);
      if (!loc) continue;
      if (await chooseOption(loc, value)) return true;
    } catch (err) {
      logSkip('select', selector, err);
    }
  }
  return false;
}

/**
 * Check or uncheck. Native checkbox/radio inputs go through the driver;
 * anything else gets `checked` set in-page with input/change events.
 */
export async function setCheckIfPossible(page: Page, selectors: string[], checked: boolean): Promise<boolean> {
  for (const selector of selectors) {
    try {
      const loc = await usableLocator(page, selector);
      if (!loc) continue;
      const type = ((await loc.getAttribute('type')) ?? '').toLowerCase();
      if (type === 'checkbox' || type === 'radio') {
        if (checked) await loc.check();
        else await loc.uncheck();
        return true;
      }
      const applied = await page.evaluate(
        ([sel, state]) => {
          const el = document.querySelector(sel);
          if (!(el instanceof HTMLInputElement)) return false;
          if (el.type !== 'checkbox' && el.type !== 'radio') return false;
          el.checked = state;
          el.dispatchEvent(new Event('input', { bubbles: true }));
          el.dispatchEvent(new Event('change', { bubbles: true }));
          return true;
        },
        [selector, checked] as const,
      );
      if (applied) return true;
    } catch (err) {
      logSkip('check', selector, err);
    }
  }
  return false;
}

export async function fillByLabel(page: Page, patterns: RegExp[], value: string): Promise<boolean> {
  if (!value) return false;
  for (const pattern of patterns) {
    try {
      const loc = page.getByLabel(pattern).first();
      if ((await loc.count()) === 0) continue;
      if (!(await loc.isVisible())) continue;
      await loc.fill(value);
      return true;
    } catch (err) {
      logSkip('label', pattern.source, err);
    }
  }
  return false;
}

/** Select-by-label counterpart of `selectIfPossible`, matching options the same way. */
export async function selectByLabel(page: Page, patterns: RegExp[], value: string): Promise<boolean> {
  if (!value) return false;
  for (const pattern of patterns) {
    try {
      const loc = page.getByLabel(pattern).first();
      if ((await loc.count()) === 0) continue;
      if (await chooseOption(loc, value)) return true;
    } catch (err) {
      logSkip('label-select', pattern.source, err);
    }
  }
  return false;
}
