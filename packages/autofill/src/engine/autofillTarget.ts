import type { ApplicantPayload } from '../canonical/payload.js';
import { InvalidTargetError } from '../errors.js';
import type { FieldMapping } from '../mapping/types.js';
import { getLogger } from '../monitoring/logger.js';
import { launchChromium, newAutofillContext, type BrowserLauncher } from '../sessions/BrowserPool.js';
import { fillHtmlPage } from './html/HtmlFillStrategy.js';
import { fillPdfTarget } from './pdf/PdfFillStrategy.js';
import { classifyTarget, type HttpFetch } from './targetClassifier.js';
import type { FillResult } from './types.js';

export interface AutofillTargetOptions {
  timeoutMs?: number;
  slowmo?: number;
  headless?: boolean;
  explicitMappings?: FieldMapping[];
  strict?: boolean;
  fetch?: HttpFetch;
  launcher?: BrowserLauncher;
}

const SETTLE_AFTER_LOAD_MS = 800;

/**
 * Standalone fill of a target URL: document resources are downloaded and
 * filled offline, interactive pages in a throw-away browser.
 */
export async function autofillTarget(
  payload: ApplicantPayload,
  targetUrl: string,
  outDir: string,
  opts: AutofillTargetOptions = {},
): Promise<FillResult> {
  const target = (targetUrl ?? '').trim();
  if (!target) throw new InvalidTargetError('target_url is required.');
  const timeoutMs = opts.timeoutMs ?? 20_000;
  const fillOpts = { explicitMappings: opts.explicitMappings, strict: opts.strict };

  const kind = await classifyTarget(target, { fetch: opts.fetch });
  getLogger().info('Autofill target classified', { kind });
  if (kind === 'document') {
    return fillPdfTarget(payload, target, outDir, { ...fillOpts, fetch: opts.fetch, timeoutMs });
  }

  const launcher = opts.launcher ?? launchChromium;
  const browser = await launcher({ headless: opts.headless ?? true, slowmo: opts.slowmo ?? 80 });
  try {
    const context = await newAutofillContext(browser);
    try {
      const page = await context.newPage();
      page.setDefaultTimeout(timeoutMs);
      await page.goto(target, { waitUntil: 'domcontentloaded' });
      await page.waitForTimeout(SETTLE_AFTER_LOAD_MS);
      return await fillHtmlPage(page, payload, outDir, fillOpts);
    } finally {
      await context.close();
    }
  } finally {
    await browser.close();
  }
}
