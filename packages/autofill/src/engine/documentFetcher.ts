import { getEnv } from '../config/env.js';
import { InvalidTargetError } from '../errors.js';
import { isPdfBytes } from './signatures.js';
import type { HttpFetch } from './targetClassifier.js';

export interface FetchedDocument {
  bytes: Uint8Array;
  contentType: string;
}

/**
 * Download a document resource. Bytes are accepted when they carry the `%PDF`
 * signature or the server labels them `application/pdf`.
 */
export async function fetchDocument(
  targetUrl: string,
  opts: { fetch?: HttpFetch; timeoutMs?: number } = {},
): Promise<FetchedDocument> {
  const doFetch = opts.fetch ?? fetch;
  const timeoutMs = Math.max(10_000, opts.timeoutMs ?? 20_000);

  const response = await doFetch(targetUrl, {
    headers: { 'User-Agent': getEnv().AUTOFILL_USER_AGENT },
    redirect: 'follow',
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!response.ok) {
    throw new Error(`Document download failed with status ${response.status}`);
  }

  const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
  const bytes = new Uint8Array(await response.arrayBuffer());
  if (!isPdfBytes(bytes) && !contentType.includes('application/pdf')) {
    throw new InvalidTargetError(`Target URL does not look like PDF (content-type=${contentType}).`);
  }
  return { bytes, contentType };
}
