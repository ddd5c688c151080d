export * from './types.js';
export * from './checkedWhen.js';
export * from './placeholders.js';
export { suggestMappings, scoreField, fieldKindFor } from './suggestions.js';
export { TemplateStore } from './TemplateStore.js';
export type { TemplateStoreConfig, TemplateSource, TemplateRepository } from './TemplateStore.js';
export { FileTemplateStore, createTemplateStore, targetFileKey } from './FileTemplateStore.js';
export { TemplateResolver } from './TemplateResolver.js';
export type { TemplateResolution, TemplateErrorCode } from './TemplateResolver.js';
