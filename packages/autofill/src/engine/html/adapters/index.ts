import { adminTasasAdapter } from './adminTasas.js';
import { genericHtmlAdapter } from './genericHtml.js';
import { tasa790Adapter } from './tasa790.js';
import type { HtmlFormAdapter } from './types.js';

export { FilledFields, writeField } from './types.js';
export type { AdapterName, HtmlFormAdapter } from './types.js';
export { adminTasasAdapter, genericHtmlAdapter, tasa790Adapter };

const REGISTRY: HtmlFormAdapter[] = [adminTasasAdapter, tasa790Adapter, genericHtmlAdapter];

/** Adapters that apply to a URL, most specific first; the generic one is always last. */
export function pickHtmlAdapters(targetUrl: string): HtmlFormAdapter[] {
  const { host, path } = urlParts(targetUrl);
  return REGISTRY.filter((adapter) => adapter.matches(host, path));
}

/** Whether `adapter` claims `targetUrl`. */
export function adapterMatches(adapter: HtmlFormAdapter, targetUrl: string): boolean {
  const { host, path } = urlParts(targetUrl);
  return adapter.matches(host, path);
}

function urlParts(targetUrl: string): { host: string; path: string } {
  if (!URL.canParse(targetUrl)) return { host: '', path: '' };
  const url = new URL(targetUrl);
  return { host: url.host.toLowerCase(), path: url.pathname.toLowerCase() };
}
