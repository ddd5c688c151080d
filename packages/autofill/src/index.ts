export * from './canonical/index.js';
export * from './mapping/index.js';
export * from './engine/index.js';
export * from './sessions/index.js';
export * from './errors.js';
export { acquireDocument } from './artifacts/acquisition.js';
export type { AcquireOptions, AcquiredDocument, AcquisitionStrategy } from './artifacts/acquisition.js';
export { ArtifactWriter, downloadFilename } from './artifacts/ArtifactWriter.js';
export { getEnv } from './config/index.js';
export { getLogger } from './monitoring/logger.js';
export { getSupabaseClient } from './db/client.js';
