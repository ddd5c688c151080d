/**
 * Decide whether a target URL is a document resource (PDF) or an interactive
 * page. URL shape is checked first; extension-less URLs are probed over HTTP.
 */

import { getEnv } from '../config/env.js';
import { errorMessage } from '../errors.js';
import { getLogger } from '../monitoring/logger.js';

export type TargetKind = 'document' | 'interactive';

export type HttpFetch = (input: string, init?: RequestInit) => Promise<Response>;

export interface ClassifyOptions {
  fetch?: HttpFetch;
  timeoutMs?: number;
}

/** Hosts that serve PDF forms on extension-less paths. */
const DOCUMENT_HOST_PATHS: Array<{ host: string; pathPrefix: string }> = [
  { host: 'inclusion.gob.es', pathPrefix: '/documents/d/' },
];

function urlParts(targetUrl: string): { host: string; path: string; query: string } {
  if (!URL.canParse(targetUrl)) return { host: '', path: '', query: '' };
  const url = new URL(targetUrl);
  return {
    host: url.host.toLowerCase(),
    path: url.pathname.toLowerCase(),
    query: url.search.toLowerCase(),
  };
}

/** URL-only check, no network. */
export function looksLikeDocumentUrl(targetUrl: string): boolean {
  const raw = (targetUrl ?? '').toLowerCase();
  if (!raw) return false;
  const { host, path, query } = urlParts(targetUrl);
  if (path.endsWith('.pdf') || raw.includes('.pdf') || query.includes('.pdf')) return true;
  return DOCUMENT_HOST_PATHS.some((p) => host.includes(p.host) && path.startsWith(p.pathPrefix));
}

function responseLooksLikeDocument(response: Response): boolean {
  const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
  const disposition = (response.headers.get('content-disposition') ?? '').toLowerCase();
  const finalPath = urlParts(response.url).path;
  return contentType.includes('application/pdf') || finalPath.includes('.pdf') || disposition.includes('.pdf');
}

export async function classifyTarget(targetUrl: string, opts: ClassifyOptions = {}): Promise<TargetKind> {
  if (looksLikeDocumentUrl(targetUrl)) return 'document';

  const env = getEnv();
  const doFetch = opts.fetch ?? fetch;
  const timeoutMs = opts.timeoutMs ?? env.PROBE_TIMEOUT_MS;
  const headers = { 'User-Agent': env.AUTOFILL_USER_AGENT };
  const log = getLogger().child({ component: 'targetClassifier' });

  for (const method of ['HEAD', 'GET'] as const) {
    try {
      const response = await doFetch(targetUrl, {
        method,
        headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(timeoutMs),
      });
      const isDocument = responseLooksLikeDocument(response);
      // Only headers are needed.
      await response.body?.cancel();
      if (isDocument) return 'document';
    } catch (err) {
      log.debug('Target probe failed', { method, error: errorMessage(err) });
    }
  }
  return 'interactive';
}
