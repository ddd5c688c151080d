// --------------------------------------------------------------------------
// Error types
// --------------------------------------------------------------------------

export type AutofillErrorCode =
  | 'not_found'
  | 'invalid_target'
  | 'unresolved_required_field'
  | 'download_unavailable'
  | 'adapter_failure'
  | 'navigation_failed';

export class AutofillError extends Error {
  constructor(
    message: string,
    public readonly code: AutofillErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AutofillError';
  }
}

export class NotFoundError extends AutofillError {
  constructor(what: 'session' | 'template', id: string) {
    super(`${what === 'session' ? 'Browser session' : 'Mapping template'} not found: ${id}`, 'not_found');
    this.name = 'NotFoundError';
  }
}

export class InvalidTargetError extends AutofillError {
  constructor(message = 'Target URL is required.') {
    super(message, 'invalid_target');
    this.name = 'InvalidTargetError';
  }
}

export class UnresolvedRequiredFieldError extends AutofillError {
  constructor(
    public readonly group: string,
    message: string,
  ) {
    super(message, 'unresolved_required_field', { group });
    this.name = 'UnresolvedRequiredFieldError';
  }
}

export interface DownloadDiagnostics {
  dumpPath?: string;
  screenshotPath?: string;
  attempts: Array<{ strategy: string; reason: string }>;
}

export class DownloadUnavailableError extends AutofillError {
  constructor(
    message: string,
    public readonly diagnostics: DownloadDiagnostics,
  ) {
    super(message, 'download_unavailable', diagnostics);
    this.name = 'DownloadUnavailableError';
  }
}

/** Raised inside an adapter or candidate attempt; callers log it and continue. */
export class AdapterFailure extends AutofillError {
  constructor(
    public readonly adapter: string,
    cause: unknown,
  ) {
    super(`Adapter "${adapter}" failed: ${errorMessage(cause)}`, 'adapter_failure');
    this.name = 'AdapterFailure';
  }
}

export class NavigationError extends AutofillError {
  constructor(
    public readonly targetUrl: string,
    public readonly attempts: string[],
  ) {
    super(`Load failed for URL: ${targetUrl}. Attempts: ${attempts.join(' | ')}`, 'navigation_failed');
    this.name = 'NavigationError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
