/**
 * Document acquisition fallback chain.
 *
 * Government portals deliver the filled document in many ways: a real
 * download, a PDF response rendered in a viewer, a popup, a blob URL, or only
 * on a fresh form POST. Each strategy below returns Ok or Err; the first Ok
 * wins. A recognized server validation page stops the chain early.
 */

import { readFile, rm } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { BrowserContext, Download, Page } from 'playwright-core';
import type { ApplicantPayload } from '../canonical/payload.js';
import { shouldSaveScreenshots } from '../config/env.js';
import { isPdfBytes, looksLikeHtml, extractKnownServerError } from '../engine/signatures.js';
import { DownloadUnavailableError, errorMessage, type DownloadDiagnostics } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { NetworkRecorder } from '../sessions/NetworkRecorder.js';
import { ArtifactWriter, downloadFilename } from './ArtifactWriter.js';

// ── Types ────────────────────────────────────────────────────────────────

export type AcquisitionStrategy =
  | 'download_event'
  | 'network_response'
  | 'request_replay'
  | 'candidate_page'
  | 'form_fetch';

export type AttemptResult =
  | { ok: true; path: string }
  | { ok: false; reason: string; stop?: boolean; dumpPath?: string };

export interface AcquiredDocument {
  path: string;
  strategy: AcquisitionStrategy;
}

export interface AcquireOptions {
  page: Page;
  context: BrowserContext;
  recorder: NetworkRecorder;
  payload: ApplicantPayload;
  outDir: string;
  timeoutMs: number;
  /** The user clicks download themselves; the event wait is stretched to at least 10 minutes. */
  manual?: boolean;
  /** Accessible name of the button that triggers the download. */
  downloadButtonName?: RegExp;
  /** URL the session was opened on; never treated as a document candidate. */
  formUrl?: string;
  now?: () => Date;
}

export const MANUAL_DOWNLOAD_MIN_TIMEOUT_MS = 10 * 60 * 1000;
export const DEFAULT_DOWNLOAD_BUTTON_NAME = /Descargar impreso rellenado/i;

interface FormFetchResult {
  ok: boolean;
  status: number;
  ctype: string;
  b64: string;
}

// ── Chain ────────────────────────────────────────────────────────────────

class Acquisition {
  readonly writer: ArtifactWriter;
  readonly log: Logger;
  readonly attempts: DownloadDiagnostics['attempts'] = [];

  constructor(readonly opts: AcquireOptions) {
    this.writer = new ArtifactWriter(opts.outDir, opts.now);
    this.log = getLogger().child({ component: 'DocumentAcquisition' });
  }

  private now(): Date {
    return this.opts.now ? this.opts.now() : new Date();
  }

  private filenameFor(suggested: string): string {
    const name = suggested.toLowerCase().endsWith('.pdf') ? suggested : 'document.pdf';
    return downloadFilename(this.opts.payload, name, this.now());
  }

  async saveDocument(bytes: Uint8Array, suggested: string): Promise<AttemptResult> {
    const path = await this.writer.writeBytes(this.filenameFor(suggested), bytes);
    return { ok: true, path };
  }

  async screenshot(page: Page, label: string): Promise<string> {
    try {
      return await this.writer.saveScreenshot(page, label);
    } catch (err) {
      this.log.warn('Screenshot failed', { label, error: errorMessage(err) });
      return '';
    }
  }

  /** Dump a non-document body; a recognized server error stops the chain. */
  async rejectBody(body: Uint8Array, label: string, reason: string): Promise<AttemptResult> {
    const dumpPath = await this.writer.writeBytes(this.writer.fileNameFor(label, '.bin'), body);
    const serverError = extractKnownServerError(body);
    if (serverError) return { ok: false, reason: serverError, stop: true, dumpPath };
    return { ok: false, reason, dumpPath };
  }

  // 1. Native download event
  async downloadEvent(): Promise<AttemptResult> {
    const { page, manual, timeoutMs } = this.opts;
    const waitMs = manual ? Math.max(timeoutMs, MANUAL_DOWNLOAD_MIN_TIMEOUT_MS) : timeoutMs;

    let download: Download;
    try {
      if (manual) {
        this.log.info('Waiting for a manual download', { timeoutMs: waitMs });
        download = await page.waitForEvent('download', { timeout: waitMs });
      } else {
        const button = page.getByRole('button', { name: this.opts.downloadButtonName ?? DEFAULT_DOWNLOAD_BUTTON_NAME });
        if ((await button.count()) === 0) return { ok: false, reason: 'download button not found' };
        [download] = await Promise.all([page.waitForEvent('download', { timeout: waitMs }), button.first().click()]);
      }
    } catch (err) {
      if (manual) return { ok: false, reason: 'Manual download/confirm was not completed in time.', stop: true };
      return { ok: false, reason: `no download event: ${errorMessage(err)}` };
    }

    const path = await this.writer.prepare(
      downloadFilename(this.opts.payload, download.suggestedFilename(), this.now()),
    );
    await download.saveAs(path);
    const bytes = await readFile(path);
    if (looksLikeHtml(bytes)) {
      const dumpPath = await this.writer.writeText(
        join(this.opts.outDir, `${basename(path, extname(path))}_response_dump.html`),
        await page.content(),
      );
      return { ok: false, reason: 'Downloaded content appears to be HTML, not a document.', stop: true, dumpPath };
    }
    if (!isPdfBytes(bytes)) {
      await rm(path, { force: true });
      return this.rejectBody(bytes, 'download_response', 'downloaded file is not a document');
    }
    return { ok: true, path };
  }

  // 2. Recorded document-like responses
  async networkResponses(): Promise<AttemptResult> {
    const responses = this.opts.recorder.documentResponses;
    if (responses.length === 0) return { ok: false, reason: 'no document-like responses recorded' };

    let last: AttemptResult = { ok: false, reason: 'recorded responses held no document' };
    for (const [i, response] of responses.entries()) {
      const idx = i + 1;
      try {
        const body = await response.body();
        if (body.length === 0) continue;
        if (isPdfBytes(body)) {
          return await this.saveDocument(body, basename(new URL(response.url()).pathname) || `network_capture_${idx}.pdf`);
        }
        last = await this.rejectBody(body, `network_response_${idx}`, `response #${idx} is not a document`);
        if (!last.ok && last.stop) return last;
        this.log.warn('Captured response is not a document', {
          idx,
          contentType: response.headers()['content-type'] ?? '',
        });
      } catch (err) {
        this.log.error('Failed to persist captured response', { idx, error: errorMessage(err) });
      }
    }
    return last;
  }

  // 3. Replay of recorded document-producing requests
  async replayRequests(): Promise<AttemptResult> {
    const { recorder, context, timeoutMs } = this.opts;
    if (recorder.documentRequests.length === 0) return { ok: false, reason: 'no document requests recorded' };

    let last: AttemptResult = { ok: false, reason: 'replayed requests returned no document' };
    for (const [i, request] of recorder.documentRequests.entries()) {
      const idx = i + 1;
      try {
        const response = await context.request.fetch(request, { timeout: timeoutMs });
        const body = await response.body();
        if (body.length > 0 && isPdfBytes(body)) return await this.saveDocument(body, `replay_${idx}.pdf`);
        last = await this.rejectBody(body, `replay_response_${idx}`, `replay #${idx} returned status ${response.status()}`);
        if (!last.ok && last.stop) return last;
      } catch (err) {
        this.log.error('Failed replaying captured request', { idx, error: errorMessage(err) });
      }
    }
    return last;
  }

  candidatePages(): Page[] {
    const { page, context, recorder } = this.opts;
    const out: Page[] = [...recorder.popups];
    for (const p of context.pages()) if (!out.includes(p)) out.push(p);
    if (!out.includes(page)) out.unshift(page);
    return out;
  }

  private async fetchPageUrl(candidate: Page): Promise<AttemptResult> {
    const url = candidate.url();
    const response = await this.opts.context.request.get(url, { timeout: this.opts.timeoutMs });
    if (!response.ok()) return { ok: false, reason: `candidate URL status ${response.status()}` };
    const body = await response.body();
    if (isPdfBytes(body)) return this.saveDocument(body, basename(new URL(url).pathname) || 'document.pdf');
    const dumpPath = await this.writer.writeBytes(this.writer.fileNameFor('popup_response', '.html'), body);
    return { ok: false, reason: 'candidate URL did not return a document', dumpPath };
  }

  private async extractInPage(candidate: Page): Promise<AttemptResult> {
    const b64 = await candidate.evaluate(async () => {
      const sources: string[] = [];
      if (location.href.startsWith('blob:')) sources.push(location.href);
      const embedded = document.querySelector('embed[src], object[data], iframe[src]');
      const src = embedded?.getAttribute('src') ?? embedded?.getAttribute('data');
      if (src) sources.push(src);
      for (const source of sources) {
        try {
          const res = await fetch(source);
          if (!res.ok) continue;
          const bytes = new Uint8Array(await res.arrayBuffer());
          let binary = '';
          for (let i = 0; i < bytes.length; i += 0x8000) {
            binary += String.fromCharCode(...bytes.subarray(i, i + 0x8000));
          }
          return btoa(binary);
        } catch (err) {
          console.debug('in-page document fetch failed', err);
        }
      }
      return '';
    });
    if (!b64) return { ok: false, reason: 'no blob or embedded document in page' };
    const bytes = Buffer.from(b64, 'base64');
    if (!isPdfBytes(bytes)) return { ok: false, reason: 'embedded resource is not a document' };
    return this.saveDocument(bytes, 'document.pdf');
  }

  // 4. Popups, every context page and the current page
  async pageCandidates(): Promise<AttemptResult> {
    const formUrl = this.opts.formUrl ?? '';
    let last: AttemptResult = { ok: false, reason: 'no candidate page held a document' };
    for (const [i, candidate] of this.candidatePages().entries()) {
      const idx = i + 1;
      try {
        await candidate.waitForLoadState('domcontentloaded', { timeout: 5000 });
      } catch (err) {
        this.log.debug('Candidate page load wait timed out', { idx, error: errorMessage(err) });
      }
      const url = candidate.url();
      try {
        if (url && url !== 'about:blank' && url !== formUrl && !url.startsWith('blob:') && !url.startsWith('about:')) {
          const fetched = await this.fetchPageUrl(candidate);
          if (fetched.ok) return fetched;
          last = fetched;
        }
        const extracted = await this.extractInPage(candidate);
        if (extracted.ok) return extracted;
        last = extracted;
      } catch (err) {
        this.log.error('Candidate page attempt failed', { idx, error: errorMessage(err) });
      }
    }
    return last;
  }

  // 5. Resubmit the page's form with an in-page fetch
  async formFetch(): Promise<AttemptResult> {
    const result: FormFetchResult | null = await this.opts.page.evaluate(async () => {
      const form = document.querySelector('form');
      if (!form) return null;
      const action = form.getAttribute('action') || window.location.href;
      const method = (form.getAttribute('method') || 'POST').toUpperCase();
      const params = new URLSearchParams();
      new FormData(form).forEach((value, key) => params.append(key, String(value)));
      const resp = await fetch(action, {
        method,
        headers: { 'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8' },
        body: params.toString(),
        credentials: 'same-origin',
      });
      const bytes = new Uint8Array(await resp.arrayBuffer());
      let binary = '';
      for (let i = 0; i < bytes.length; i += 0x8000) {
        binary += String.fromCharCode(...bytes.subarray(i, i + 0x8000));
      }
      return {
        ok: resp.ok,
        status: resp.status,
        ctype: (resp.headers.get('content-type') || '').toLowerCase(),
        b64: btoa(binary),
      };
    });
    if (!result) return { ok: false, reason: 'form not found' };
    if (!result.b64) return { ok: false, reason: `form fetch returned empty body (status ${result.status})` };
    const body = Buffer.from(result.b64, 'base64');
    if (!isPdfBytes(body)) {
      return this.rejectBody(body, 'form_fetch_response', `form fetch returned non-document bytes (status ${result.status})`);
    }
    return this.saveDocument(body, 'document.pdf');
  }
}

const STRATEGIES: Array<[AcquisitionStrategy, (a: Acquisition) => Promise<AttemptResult>]> = [
  ['download_event', (a) => a.downloadEvent()],
  ['network_response', (a) => a.networkResponses()],
  ['request_replay', (a) => a.replayRequests()],
  ['candidate_page', (a) => a.pageCandidates()],
  ['form_fetch', (a) => a.formFetch()],
];

/**
 * Run the strategies in order and return the first document saved.
 * Throws DownloadUnavailableError, with an HTML dump and a screenshot of the
 * page, when every strategy fails or one of them stops the chain.
 */
export async function acquireDocument(opts: AcquireOptions): Promise<AcquiredDocument> {
  const acq = new Acquisition(opts);

  for (const [strategy, attempt] of STRATEGIES) {
    let result: AttemptResult;
    try {
      result = await attempt(acq);
    } catch (err) {
      result = { ok: false, reason: errorMessage(err) };
    }

    if (result.ok) {
      acq.log.info('Document saved', { strategy, path: result.path });
      if (shouldSaveScreenshots()) await acq.screenshot(opts.page, `after_download_${strategy}`);
      return { path: result.path, strategy };
    }

    acq.attempts.push({ strategy, reason: result.reason });
    acq.log.warn('Acquisition strategy failed', { strategy, reason: result.reason });
    if (result.stop) {
      const screenshotPath = await acq.screenshot(opts.page, `${strategy}_error`);
      const message = result.dumpPath ? `${result.reason} Dump: ${result.dumpPath}` : result.reason;
      throw new DownloadUnavailableError(message, { dumpPath: result.dumpPath, screenshotPath, attempts: acq.attempts });
    }
  }

  const dumpPath = await acq.writer.writeText(acq.writer.pathFor('download_timeout_dump', '.html'), await opts.page.content());
  const screenshotPath = await acq.screenshot(opts.page, 'download_timeout');
  acq.log.error('Download did not start', { dumpPath, screenshotPath });
  throw new DownloadUnavailableError(
    'Download did not start (possible validation errors or unresolved CAPTCHA).',
    { dumpPath, screenshotPath, attempts: acq.attempts },
  );
}
