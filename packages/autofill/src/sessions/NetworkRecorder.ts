import type { BrowserContext, Page, Request, Response } from 'playwright-core';
import { getLogger } from '../monitoring/logger.js';

export interface NetworkRecorderOptions {
  /** URLs of requests worth replaying when no download event fires. */
  documentRequestPattern?: RegExp;
  /** Per-list cap; the oldest entry is dropped first. */
  maxEntries?: number;
}

export const DEFAULT_DOCUMENT_REQUEST_PATTERN = /ImpresoRellenarDescargar/i;
export const DEFAULT_MAX_RECORDED = 25;

function pushBounded<T>(list: T[], item: T, max: number): void {
  list.push(item);
  if (list.length > max) list.splice(0, list.length - max);
}

/**
 * Records what a session's browser context produced: document-like
 * responses, document-producing requests and pages opened after attach.
 * The acquisition chain reads these when a download never materializes.
 */
export class NetworkRecorder {
  readonly documentResponses: Response[] = [];
  readonly documentRequests: Request[] = [];
  readonly popups: Page[] = [];

  private readonly pattern: RegExp;
  private readonly maxEntries: number;
  private context: BrowserContext | null = null;
  private readonly log = getLogger().child({ component: 'NetworkRecorder' });

  constructor(opts: NetworkRecorderOptions = {}) {
    this.pattern = opts.documentRequestPattern ?? DEFAULT_DOCUMENT_REQUEST_PATTERN;
    this.maxEntries = opts.maxEntries ?? DEFAULT_MAX_RECORDED;
  }

  static isDocumentResponse(url: string, contentType: string): boolean {
    return contentType.toLowerCase().includes('application/pdf') || url.toLowerCase().endsWith('.pdf');
  }

  private readonly onResponse = (response: Response): void => {
    const url = response.url();
    const contentType = response.headers()['content-type'] ?? '';
    if (NetworkRecorder.isDocumentResponse(url, contentType)) {
      pushBounded(this.documentResponses, response, this.maxEntries);
      this.log.info('Captured document-like response', { url });
    }
  };

  private readonly onRequest = (request: Request): void => {
    const url = request.url();
    if (this.pattern.test(url)) {
      pushBounded(this.documentRequests, request, this.maxEntries);
      this.log.info('Captured document request', { method: request.method(), url });
    }
  };

  private readonly onPage = (page: Page): void => {
    pushBounded(this.popups, page, this.maxEntries);
    this.log.info('Detected new page');
  };

  attach(context: BrowserContext): void {
    this.detach();
    this.context = context;
    context.on('response', this.onResponse);
    context.on('request', this.onRequest);
    context.on('page', this.onPage);
  }

  detach(): void {
    if (!this.context) return;
    this.context.off('response', this.onResponse);
    this.context.off('request', this.onRequest);
    this.context.off('page', this.onPage);
    this.context = null;
  }

  /** Forget everything captured so far; each fill starts from an empty log. */
  clear(): void {
    this.documentResponses.length = 0;
    this.documentRequests.length = 0;
    this.popups.length = 0;
  }
}
