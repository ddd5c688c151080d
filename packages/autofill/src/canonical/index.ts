export * from './vocabulary.js';
export * from './payload.js';
export * from './normalizers.js';
export { buildCanonicalFieldMap } from './valueMap.js';
