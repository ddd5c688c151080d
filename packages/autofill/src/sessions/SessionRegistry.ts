/**
 * SessionRegistry: live browser sessions a user completes by hand
 * (CAPTCHA, confirmation) between automated fill steps.
 *
 * Every driver call runs on the shared DriverWorker; operations on one
 * session are additionally serialized by its SessionLock, so `close` waits
 * for an in-flight `fill`.
 */

import { randomUUID } from 'crypto';
import type { BrowserContext, Dialog, Page } from 'playwright-core';
import { ArtifactWriter } from '../artifacts/ArtifactWriter.js';
import { acquireDocument } from '../artifacts/acquisition.js';
import type { ApplicantPayload } from '../canonical/payload.js';
import { shouldSaveScreenshotsOnError } from '../config/env.js';
import { adapterMatches, tasa790Adapter } from '../engine/html/adapters/index.js';
import { fillHtmlPage } from '../engine/html/HtmlFillStrategy.js';
import { collectHtmlFieldValues, inspectHtmlFields } from '../engine/html/inspectFields.js';
import { fetchDocument } from '../engine/documentFetcher.js';
import {
  fillForManualHandoff,
  type ManualHandoffOptions,
  type ManualHandoffResult,
} from '../engine/html/tasa790Flows.js';
import { mandatoryPageChecks, readTramiteCatalog, type TramiteGroup } from '../engine/html/tasa790Steps.js';
import { fillPdfTarget } from '../engine/pdf/PdfFillStrategy.js';
import { collectPdfFieldValues, inspectPdfFields } from '../engine/pdf/PdfFormReader.js';
import { classifyTarget, type HttpFetch } from '../engine/targetClassifier.js';
import type { FillResult, FillStrategyName } from '../engine/types.js';
import { DownloadUnavailableError, InvalidTargetError, NotFoundError, errorMessage } from '../errors.js';
import { htmlPlaceholderMappings, pdfPlaceholderMappings } from '../mapping/placeholders.js';
import { suggestMappings } from '../mapping/suggestions.js';
import type { FieldDescriptor, FieldMapping, MappingSuggestion } from '../mapping/types.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { BrowserPool, newAutofillContext, type LaunchProfile } from './BrowserPool.js';
import { DriverWorker } from './DriverWorker.js';
import { navigateWithFallback } from './navigation.js';
import { NetworkRecorder, type NetworkRecorderOptions } from './NetworkRecorder.js';
import { SessionLock } from './SessionLock.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface SessionRegistryConfig {
  pool?: BrowserPool;
  worker?: DriverWorker;
  fetch?: HttpFetch;
  recorder?: NetworkRecorderOptions;
  newId?: () => string;
}

export interface OpenSessionOptions {
  headless?: boolean;
  slowmo?: number;
  timeoutMs?: number;
}

export interface OpenedSession {
  session_id: string;
  target_url: string;
  current_url: string;
  alive: boolean;
}

export interface SessionState {
  session_id: string;
  alive: boolean;
  current_url: string;
  title: string;
}

export interface DownloadRequest {
  manual?: boolean;
  buttonName?: RegExp;
}

export interface SessionFillOptions {
  timeoutMs?: number;
  explicitMappings?: FieldMapping[];
  fillStrategy?: FillStrategyName;
  /** Run the acquisition chain after filling an interactive page. */
  download?: DownloadRequest;
}

export type SessionFillResult = FillResult & { session_id: string; current_url: string };

export interface SessionInspection {
  current_url: string;
  fields: FieldDescriptor[];
  suggestions: MappingSuggestion[];
  placeholder_mappings: FieldMapping[];
  unknown_placeholders: string[];
}

interface SessionRecord {
  sessionId: string;
  targetUrl: string;
  profile: LaunchProfile;
  context: BrowserContext;
  page: Page;
  recorder: NetworkRecorder;
  lock: SessionLock;
  log: Logger;
}

const DEFAULT_TIMEOUT_MS = 25_000;
const PROBE_TIMEOUT_CAP_MS = 15_000;

// No-op handlers keep dialogs open for the user instead of auto-dismissing them.
const keepDialogOpen = (_dialog: Dialog): void => {};

// ── Implementation ───────────────────────────────────────────────────────

export class SessionRegistry {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly pool: BrowserPool;
  private readonly worker: DriverWorker;
  private readonly fetchImpl?: HttpFetch;
  private readonly recorderOptions: NetworkRecorderOptions;
  private readonly newId: () => string;
  private readonly log = getLogger().child({ component: 'SessionRegistry' });

  constructor(config: SessionRegistryConfig = {}) {
    this.pool = config.pool ?? new BrowserPool();
    this.worker = config.worker ?? new DriverWorker();
    this.fetchImpl = config.fetch;
    this.recorderOptions = config.recorder ?? {};
    this.newId = config.newId ?? (() => randomUUID().replace(/-/g, ''));
  }

  get size(): number {
    return this.sessions.size;
  }

  private get(sessionId: string): SessionRecord {
    const session = this.sessions.get(sessionId);
    if (!session) throw new NotFoundError('session', sessionId);
    return session;
  }

  private async isDocumentUrl(url: string): Promise<boolean> {
    if (!url || url === 'about:blank') return false;
    return (await classifyTarget(url, { fetch: this.fetchImpl })) === 'document';
  }

  /** Current URL if document-like, else the opening URL if it is (or parses as a PDF form). */
  private async documentUrlFor(session: SessionRecord, timeoutMs: number): Promise<string> {
    const currentUrl = session.page.url();
    if (await this.isDocumentUrl(currentUrl)) return currentUrl;
    if (await this.isDocumentUrl(session.targetUrl)) return session.targetUrl;
    try {
      const { bytes } = await fetchDocument(session.targetUrl, {
        fetch: this.fetchImpl,
        timeoutMs: Math.min(timeoutMs, PROBE_TIMEOUT_CAP_MS),
      });
      await inspectPdfFields(bytes);
      return session.targetUrl;
    } catch (err) {
      session.log.debug('Target is not a fillable document', { error: errorMessage(err) });
      return '';
    }
  }

  async open(targetUrl: string, opts: OpenSessionOptions = {}): Promise<OpenedSession> {
    const target = (targetUrl ?? '').trim();
    if (!target) throw new InvalidTargetError();
    const profile: LaunchProfile = { headless: opts.headless ?? false, slowmo: opts.slowmo ?? 80 };
    const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    return this.worker.run(async () => {
      const browser = await this.pool.acquire(profile);
      let context: BrowserContext | null = null;
      try {
        context = await newAutofillContext(browser);
        const page = await context.newPage();
        page.setDefaultTimeout(timeoutMs);
        context.on('dialog', keepDialogOpen);
        page.on('dialog', keepDialogOpen);

        const recorder = new NetworkRecorder(this.recorderOptions);
        recorder.attach(context);
        await navigateWithFallback(page, target, timeoutMs, await this.isDocumentUrl(target));

        const sessionId = this.newId();
        const session: SessionRecord = {
          sessionId,
          targetUrl: target,
          profile,
          context,
          page,
          recorder,
          lock: new SessionLock(),
          log: this.log.child({ sessionId }),
        };
        this.sessions.set(sessionId, session);
        session.log.info('Browser session opened', { currentUrl: page.url() });
        return { session_id: sessionId, target_url: target, current_url: page.url(), alive: true };
      } catch (err) {
        if (context) {
          await context.close().catch((closeErr: unknown) => {
            this.log.warn('Context close after failed open failed', { error: errorMessage(closeErr) });
          });
        }
        await this.pool.release(profile);
        throw err;
      }
    });
  }

  /**
   * Answers without the session lock, so state stays readable while a fill
   * or a manual download wait holds it. The title is read only when the
   * driver worker is idle.
   */
  async getState(sessionId: string): Promise<SessionState> {
    const session = this.get(sessionId);
    const alive = !session.page.isClosed();
    let title = '';
    if (alive && this.worker.queued === 0) {
      try {
        title = await this.worker.run(() => session.page.title());
      } catch (err) {
        session.log.debug('Title unavailable', { error: errorMessage(err) });
      }
    }
    return { session_id: sessionId, alive, current_url: alive ? session.page.url() : '', title };
  }

  async fill(
    sessionId: string,
    payload: ApplicantPayload,
    outDir: string,
    opts: SessionFillOptions = {},
  ): Promise<SessionFillResult> {
    const session = this.get(sessionId);
    const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const strict = (opts.fillStrategy ?? 'strict_template') !== 'heuristic_fallback';
    const fillOpts = { explicitMappings: opts.explicitMappings, strict };

    return session.lock.runExclusive(() =>
      this.worker.run(async () => {
        if (session.page.isClosed()) throw new Error('Browser session page is closed.');
        const currentUrl = session.page.url();
        session.recorder.clear();

        const documentUrl = await this.documentUrlFor(session, timeoutMs);
        if (documentUrl) {
          session.log.info('Filling document target', { strict });
          const result = await fillPdfTarget(payload, documentUrl, outDir, {
            ...fillOpts,
            fetch: this.fetchImpl,
            timeoutMs,
          });
          return { ...result, session_id: sessionId, current_url: currentUrl };
        }

        session.log.info('Filling interactive page', { strict });
        let result: FillResult;
        try {
          result = await fillHtmlPage(session.page, payload, outDir, fillOpts);
        } catch (err) {
          if (shouldSaveScreenshotsOnError()) {
            await new ArtifactWriter(outDir).saveScreenshot(session.page, 'fill_error').catch((shotErr: unknown) => {
              session.log.warn('Error screenshot failed', { error: errorMessage(shotErr) });
            });
          }
          throw err;
        }
        if (opts.download) {
          await this.assertReadyForDownload(session, outDir);
          const acquired = await acquireDocument({
            page: session.page,
            context: session.context,
            recorder: session.recorder,
            payload,
            outDir,
            timeoutMs,
            manual: opts.download.manual,
            downloadButtonName: opts.download.buttonName,
            formUrl: session.targetUrl,
          });
          result.artifacts.filled_document = acquired.path;
        }
        return { ...result, session_id: sessionId, current_url: session.page.url() };
      }),
    );
  }

  /** Fee-form pages must have every mandatory value before the download is requested. */
  private async assertReadyForDownload(session: SessionRecord, outDir: string): Promise<void> {
    if (!adapterMatches(tasa790Adapter, session.page.url())) return;
    const issues = await mandatoryPageChecks(session.page);
    if (issues.length === 0) return;
    let screenshotPath: string | undefined;
    try {
      screenshotPath = await new ArtifactWriter(outDir).saveScreenshot(session.page, 'before_download_validation_error');
    } catch (err) {
      session.log.warn('Validation screenshot failed', { error: errorMessage(err) });
    }
    throw new DownloadUnavailableError(
      `Form still has missing mandatory values before download:\n${issues.map((issue) => `- ${issue}`).join('\n')}`,
      { screenshotPath, attempts: [] },
    );
  }

  /** Fill the fee form's sections except the trámite and leave it for the user. */
  async handoff(
    sessionId: string,
    payload: ApplicantPayload,
    outDir: string,
    opts: ManualHandoffOptions = {},
  ): Promise<ManualHandoffResult> {
    const session = this.get(sessionId);
    return session.lock.runExclusive(() =>
      this.worker.run(async () => {
        if (session.page.isClosed()) throw new Error('Browser session page is closed.');
        return fillForManualHandoff(session.page, payload, outDir, opts);
      }),
    );
  }

  /** Trámite groups offered by the fee form open in this session. */
  async tramiteCatalog(sessionId: string): Promise<TramiteGroup[]> {
    const session = this.get(sessionId);
    return session.lock.runExclusive(() =>
      this.worker.run(async () => {
        if (session.page.isClosed()) throw new Error('Browser session page is closed.');
        return readTramiteCatalog(session.page);
      }),
    );
  }

  async inspectFields(
    sessionId: string,
    payload: ApplicantPayload,
    hints: Record<string, string> = {},
  ): Promise<SessionInspection> {
    const session = this.get(sessionId);
    return session.lock.runExclusive(() =>
      this.worker.run(async () => {
        if (session.page.isClosed()) throw new Error('Browser session page is closed.');
        const currentUrl = session.page.url();
        const documentUrl = await this.documentUrlFor(session, DEFAULT_TIMEOUT_MS);

        let fields: FieldDescriptor[];
        let extraction: { mappings: FieldMapping[]; unknown: string[] };
        if (documentUrl) {
          const { bytes } = await fetchDocument(documentUrl, { fetch: this.fetchImpl });
          fields = await inspectPdfFields(bytes);
          extraction = pdfPlaceholderMappings(await collectPdfFieldValues(bytes), 'placeholder');
        } else {
          fields = await inspectHtmlFields(session.page);
          extraction = htmlPlaceholderMappings(await collectHtmlFieldValues(session.page));
        }

        return {
          current_url: currentUrl,
          fields,
          suggestions: suggestMappings(fields, payload, hints),
          placeholder_mappings: extraction.mappings,
          unknown_placeholders: extraction.unknown,
        };
      }),
    );
  }

  /** Close a session; unknown ids are ignored. */
  async close(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    this.sessions.delete(sessionId);

    await session.lock.runExclusive(() =>
      this.worker.run(async () => {
        session.recorder.detach();
        try {
          await session.context.close();
        } finally {
          await this.pool.release(session.profile);
        }
        session.log.info('Browser session closed');
      }),
    );
  }

  /** Close every session and any browser still held by the pool, then stop the worker. */
  async teardown(): Promise<void> {
    for (const sessionId of [...this.sessions.keys()]) {
      await this.close(sessionId);
    }
    await this.worker.run(() => this.pool.closeAll());
    await this.worker.stop();
  }
}
