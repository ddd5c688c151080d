import type { Page } from 'playwright-core';
import { NavigationError, errorMessage } from '../errors.js';
import { getLogger } from '../monitoring/logger.js';

const WAIT_TIERS = ['domcontentloaded', 'load', 'commit'] as const;

/**
 * Navigate with progressively weaker load conditions.
 *
 * Document targets often abort the navigation (`ERR_ABORTED`) once the
 * browser hands the response to a viewer or a download; that counts as
 * arrived when the target is document-like or the page URL already moved.
 */
export async function navigateWithFallback(
  page: Page,
  targetUrl: string,
  timeoutMs: number,
  targetIsDocument: boolean,
): Promise<void> {
  const attempts: string[] = [];
  for (const waitUntil of WAIT_TIERS) {
    try {
      await page.goto(targetUrl, { waitUntil, timeout: timeoutMs });
      return;
    } catch (err) {
      const message = errorMessage(err);
      attempts.push(`${waitUntil}: ${message}`);
      const current = page.url();
      if (message.toUpperCase().includes('ERR_ABORTED') && (targetIsDocument || (current && current !== 'about:blank'))) {
        getLogger().debug('Navigation aborted on a document target, accepted', { waitUntil });
        return;
      }
    }
  }
  throw new NavigationError(targetUrl, attempts);
}
