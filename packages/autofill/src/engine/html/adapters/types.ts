import type { Page } from 'playwright-core';
import type { ApplicantPayload } from '../../../canonical/payload.js';
import type { CanonicalFieldKey, CanonicalFieldMap } from '../../../canonical/vocabulary.js';

/** Ordered, de-duplicated list of canonical keys written during a fill. */
export class FilledFields {
  private readonly keys: string[] = [];

  add(key: string): void {
    if (key && !this.keys.includes(key)) this.keys.push(key);
  }

  has(key: string): boolean {
    return this.keys.includes(key);
  }

  toArray(): string[] {
    return [...this.keys];
  }
}

export type AdapterName = 'admin_tasas_pdf' | 'tasa_790_012' | 'generic_html';

/**
 * Site-specific fill logic applied after explicit mappings in heuristic mode.
 * Adapters never throw past the strategy: failures are logged and the chain
 * moves on.
 */
export interface HtmlFormAdapter {
  readonly name: AdapterName;
  matches(host: string, path: string): boolean;
  apply(page: Page, values: CanonicalFieldMap, filled: FilledFields, payload: ApplicantPayload): Promise<void>;
}

/**
 * One adapter step: write `value` for `key` via `write`, recording success.
 * Keys an earlier step already wrote are left alone.
 */
export async function writeField(
  filled: FilledFields,
  key: CanonicalFieldKey,
  value: string,
  write: (value: string) => Promise<boolean>,
): Promise<void> {
  if (filled.has(key)) return;
  if (value && (await write(value))) filled.add(key);
}
