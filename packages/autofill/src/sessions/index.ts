export { SessionRegistry } from './SessionRegistry.js';
export type {
  SessionRegistryConfig,
  OpenSessionOptions,
  OpenedSession,
  SessionState,
  SessionFillOptions,
  SessionFillResult,
  SessionInspection,
  DownloadRequest,
} from './SessionRegistry.js';
export { SessionFillService } from './SessionFillService.js';
export type { TemplateFillOutcome, TemplateFillOptions, FillErrorCode } from './SessionFillService.js';
export { BrowserPool, launchChromium } from './BrowserPool.js';
export type { BrowserLauncher, LaunchProfile } from './BrowserPool.js';
export { DriverWorker } from './DriverWorker.js';
export { SessionLock } from './SessionLock.js';
export { NetworkRecorder } from './NetworkRecorder.js';
