import type { Page } from 'playwright-core';
import { ArtifactWriter } from '../../artifacts/ArtifactWriter.js';
import type { ApplicantPayload } from '../../canonical/payload.js';
import { buildCanonicalFieldMap } from '../../canonical/valueMap.js';
import { errorMessage } from '../../errors.js';
import { getLogger } from '../../monitoring/logger.js';
import { launchChromium, newAutofillContext, type BrowserLauncher } from '../../sessions/BrowserPool.js';
import { FilledFields } from './adapters/types.js';
import { TASA_790_012_FORM_URL, fillTasa790MainSections, readTramiteCatalog, type TramiteGroup } from './tasa790Steps.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface ManualHandoffOptions {
  saveDomSnapshot?: boolean;
}

export interface ManualHandoffResult {
  filled_fields: string[];
  screenshot: string;
  dom_snapshot: string;
}

export interface TramiteCatalogOptions {
  formUrl?: string;
  timeoutMs?: number;
  headless?: boolean;
  launcher?: BrowserLauncher;
}

const SETTLE_AFTER_LOAD_MS = 800;

// ── Flows ────────────────────────────────────────────────────────────────

/**
 * Fill everything but the trámite and leave the page for the user to finish.
 * A screenshot of the result is always attempted.
 */
export async function fillForManualHandoff(
  page: Page,
  payload: ApplicantPayload,
  outDir: string,
  opts: ManualHandoffOptions = {},
): Promise<ManualHandoffResult> {
  const log = getLogger().child({ component: 'ManualHandoff' });
  const filled = new FilledFields();
  await fillTasa790MainSections(page, buildCanonicalFieldMap(payload), payload, filled, { selectTramite: false });

  const writer = new ArtifactWriter(outDir);
  let screenshot = '';
  try {
    screenshot = await writer.saveScreenshot(page, 'after_autofill_manual_handoff');
  } catch (err) {
    log.warn('Hand-off screenshot failed', { error: errorMessage(err) });
  }
  const domSnapshot = opts.saveDomSnapshot ? await writer.saveHtmlSnapshot(page, 'after_autofill_manual_handoff') : '';

  log.info('Form ready for manual completion', { filled: filled.toArray().length });
  return { filled_fields: filled.toArray(), screenshot, dom_snapshot: domSnapshot };
}

/** Open the fee form in a throw-away browser and list its trámite groups. */
export async function fetchTramiteCatalog(opts: TramiteCatalogOptions = {}): Promise<TramiteGroup[]> {
  const launcher = opts.launcher ?? launchChromium;
  const browser = await launcher({ headless: opts.headless ?? true, slowmo: 0 });
  try {
    const context = await newAutofillContext(browser);
    try {
      const page = await context.newPage();
      page.setDefaultTimeout(opts.timeoutMs ?? 20_000);
      await page.goto(opts.formUrl ?? TASA_790_012_FORM_URL, { waitUntil: 'domcontentloaded' });
      await page.waitForTimeout(SETTLE_AFTER_LOAD_MS);
      return await readTramiteCatalog(page);
    } finally {
      await context.close();
    }
  } finally {
    await browser.close();
  }
}
