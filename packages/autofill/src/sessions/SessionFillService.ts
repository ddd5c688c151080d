import type { ApplicantPayload } from '../canonical/payload.js';
import type { FillStrategyName } from '../engine/types.js';
import { DownloadUnavailableError, errorMessage, type DownloadDiagnostics } from '../errors.js';
import type { TemplateErrorCode, TemplateResolver } from '../mapping/TemplateResolver.js';
import { getLogger } from '../monitoring/logger.js';
import type { DownloadRequest, SessionFillResult, SessionRegistry } from './SessionRegistry.js';

// ── Types ────────────────────────────────────────────────────────────────

export type FillErrorCode = TemplateErrorCode | 'FILL_FAILED' | 'FILL_PARTIAL' | 'CURRENT_URL_EMPTY';

export type TemplateFillOutcome =
  | { status: 'ok'; form_url: string; template_source: string; result: SessionFillResult }
  | {
      status: 'error';
      form_url: string;
      error_code: FillErrorCode;
      message: string;
      dump_path?: string;
      screenshot_path?: string;
    };

export interface TemplateFillOptions {
  timeoutMs?: number;
  fillStrategy?: FillStrategyName;
  download?: DownloadRequest;
}

type SessionOps = Pick<SessionRegistry, 'getState' | 'fill'>;

// ── Implementation ───────────────────────────────────────────────────────

/**
 * Fills an open session with the template stored for whatever page the user
 * has navigated to, and reports a structured outcome instead of throwing.
 */
export class SessionFillService {
  private readonly log = getLogger().child({ component: 'SessionFillService' });

  constructor(
    private readonly sessions: SessionOps,
    private readonly resolver: Pick<TemplateResolver, 'resolveForUrl'>,
  ) {}

  async fillWithTemplate(
    sessionId: string,
    payload: ApplicantPayload,
    outDir: string,
    opts: TemplateFillOptions = {},
  ): Promise<TemplateFillOutcome> {
    let currentUrl = '';
    try {
      currentUrl = (await this.sessions.getState(sessionId)).current_url;
    } catch (err) {
      this.log.warn('Session state unavailable', { sessionId, error: errorMessage(err) });
    }
    if (!currentUrl) {
      return {
        status: 'error',
        form_url: '',
        error_code: 'CURRENT_URL_EMPTY',
        message: 'Current URL is empty in browser session.',
      };
    }

    const resolution = await this.resolver.resolveForUrl(currentUrl);
    if (!resolution.ok) {
      return { status: 'error', form_url: currentUrl, error_code: resolution.error_code, message: resolution.message };
    }

    this.log.info('Template fill started', {
      sessionId,
      templateSource: resolution.template_source,
      mappings: resolution.effective_mappings.length,
    });

    let result: SessionFillResult;
    try {
      result = await this.sessions.fill(sessionId, payload, outDir, {
        timeoutMs: opts.timeoutMs,
        explicitMappings: resolution.effective_mappings,
        fillStrategy: opts.fillStrategy,
        download: opts.download,
      });
    } catch (err) {
      this.log.error('Template fill failed', { sessionId, error: errorMessage(err) });
      const diagnostics: Partial<DownloadDiagnostics> = err instanceof DownloadUnavailableError ? err.diagnostics : {};
      return {
        status: 'error',
        form_url: currentUrl,
        error_code: 'FILL_FAILED',
        message: errorMessage(err),
        ...(diagnostics.dumpPath ? { dump_path: diagnostics.dumpPath } : {}),
        ...(diagnostics.screenshotPath ? { screenshot_path: diagnostics.screenshotPath } : {}),
      };
    }

    const formUrl = result.current_url || currentUrl;
    this.log.info('Template fill finished', {
      sessionId,
      mode: result.mode,
      filled: result.filled_fields.length,
      warnings: result.warnings.length,
    });

    if (result.mode === 'pdf' && result.filled_fields.length === 0) {
      return {
        status: 'error',
        form_url: formUrl,
        error_code: 'FILL_PARTIAL',
        message: 'PDF was processed, but no fillable fields were matched.',
      };
    }
    return { status: 'ok', form_url: formUrl, template_source: resolution.template_source, result };
  }
}
