import { createTemplateStore } from './FileTemplateStore.js';
import type { TemplateSource } from './TemplateStore.js';
import type { FieldMapping } from './types.js';

export type TemplateErrorCode = 'TEMPLATE_NOT_FOUND' | 'TEMPLATE_INVALID';

export type TemplateResolution =
  | {
      ok: true;
      current_url: string;
      template_source: string;
      effective_mappings: FieldMapping[];
    }
  | {
      ok: false;
      current_url: string;
      template_source: string;
      error_code: TemplateErrorCode;
      message: string;
    };

/**
 * Resolves the latest stored template for a URL into the mapping list a fill
 * run applies. Later entries for the same selector win.
 */
export class TemplateResolver {
  /** Defaults to the configured store: Supabase when set up, local files otherwise. */
  constructor(private readonly templates: TemplateSource = createTemplateStore()) {}

  async resolveForUrl(currentUrl: string): Promise<TemplateResolution> {
    const template = await this.templates.getLatest(currentUrl);
    if (!template) {
      return {
        ok: false,
        current_url: currentUrl,
        template_source: '',
        error_code: 'TEMPLATE_NOT_FOUND',
        message: 'Template mapping not found for current URL.',
      };
    }

    const merged = new Map<string, FieldMapping>();
    for (const item of template.mappings) {
      const selector = item.selector.trim();
      if (!selector) continue;
      merged.set(selector, {
        selector,
        canonical_key: item.canonical_key.trim(),
        field_kind: item.field_kind,
        match_value: item.match_value.trim(),
        checked_when: item.checked_when.trim(),
        source: item.source.trim() || 'template',
        confidence: item.confidence,
      });
    }

    if (merged.size === 0) {
      return {
        ok: false,
        current_url: currentUrl,
        template_source: template.source,
        error_code: 'TEMPLATE_INVALID',
        message: 'Template has no mappings.',
      };
    }

    return {
      ok: true,
      current_url: currentUrl,
      template_source: template.source,
      effective_mappings: [...merged.values()],
    };
  }
}
