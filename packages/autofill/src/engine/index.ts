export * from './types.js';
export { autofillTarget } from './autofillTarget.js';
export type { AutofillTargetOptions } from './autofillTarget.js';
export { classifyTarget, looksLikeDocumentUrl } from './targetClassifier.js';
export type { TargetKind, HttpFetch, ClassifyOptions } from './targetClassifier.js';
export { fetchDocument } from './documentFetcher.js';
export { isPdfBytes, looksLikeHtml, extractKnownServerError } from './signatures.js';
export { fillHtmlPage, applyExplicitMappings } from './html/HtmlFillStrategy.js';
export { inspectHtmlFields, collectHtmlFieldValues } from './html/inspectFields.js';
export { pickHtmlAdapters } from './html/adapters/index.js';
export {
  TASA_790_012_FORM_URL,
  mandatoryPageChecks,
  readTramiteCatalog,
  selectTramite,
  splitAmount,
} from './html/tasa790Steps.js';
export type { TramiteGroup, TramiteSelection } from './html/tasa790Steps.js';
export { fetchTramiteCatalog, fillForManualHandoff } from './html/tasa790Flows.js';
export type { ManualHandoffOptions, ManualHandoffResult, TramiteCatalogOptions } from './html/tasa790Flows.js';
export { fillPdfDocument, fillPdfTarget } from './pdf/PdfFillStrategy.js';
export type { PdfFillOptions } from './pdf/PdfFillStrategy.js';
export { inspectPdfFields, collectPdfFieldValues, loadPdfForm } from './pdf/PdfFormReader.js';
