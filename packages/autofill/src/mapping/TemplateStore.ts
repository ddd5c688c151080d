/**
 * TemplateStore: single-latest mapping template per form target.
 *
 * Templates are keyed by the normalized (host, path) of the target URL and
 * saved wholesale: there is no revision history, only `created_at` is carried
 * forward from the row being replaced.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { getEnv } from '../config/env.js';
import { getSupabaseClient } from '../db/client.js';
import { InvalidTargetError } from '../errors.js';
import { getLogger } from '../monitoring/logger.js';
import {
  MappingTemplateSchema,
  isCheckKind,
  isFieldKind,
  type FieldDescriptor,
  type FieldMapping,
  type MappingTemplate,
  type RawFieldMapping,
} from './types.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface TemplateStoreConfig {
  /** Defaults to the process-wide client built from SUPABASE_URL / SUPABASE_SECRET_KEY. */
  supabase?: SupabaseClient;
  /** Defaults to AUTOFILL_TABLE_PREFIX. */
  tablePrefix?: string;
}

/** Read side used by the resolver; tests substitute an in-memory version. */
export interface TemplateSource {
  getLatest(targetUrl: string): Promise<MappingTemplate | null>;
}

/** Read and replace; implemented over Supabase and over local JSON files. */
export interface TemplateRepository extends TemplateSource {
  save(
    targetUrl: string,
    fieldsSnapshot: FieldDescriptor[],
    mappings: RawFieldMapping[],
    source?: string,
  ): Promise<MappingTemplate>;
}

// ── Implementation ──────────────────────────────────────────────────────

export class TemplateStore implements TemplateRepository {
  private supabase: SupabaseClient;
  private table: string;

  constructor(configOrClient: TemplateStoreConfig | SupabaseClient = {}) {
    const config: TemplateStoreConfig = 'from' in configOrClient ? { supabase: configOrClient } : configOrClient;
    this.supabase = config.supabase ?? getSupabaseClient();
    this.table = `${config.tablePrefix ?? getEnv().AUTOFILL_TABLE_PREFIX}form_mappings`;
  }

  async getLatest(targetUrl: string): Promise<MappingTemplate | null> {
    const { host, path } = TemplateStore.normalizeUrlParts(targetUrl);
    if (!host) return null;

    const { data, error } = await this.supabase
      .from(this.table)
      .select('*')
      .eq('host', host)
      .eq('path', path)
      .maybeSingle();

    if (error) {
      throw new Error(`TemplateStore.getLatest failed: ${error.message}`);
    }
    if (!data) return null;

    const parsed = MappingTemplateSchema.safeParse(data);
    if (!parsed.success) {
      getLogger().warn('Discarding malformed mapping template row', {
        host,
        path,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return null;
    }
    return parsed.data;
  }

  async save(
    targetUrl: string,
    fieldsSnapshot: FieldDescriptor[],
    mappings: RawFieldMapping[],
    source = 'user',
  ): Promise<MappingTemplate> {
    const existing = await this.getLatest(targetUrl);
    const template = TemplateStore.buildTemplate(targetUrl, fieldsSnapshot, mappings, source, existing);

    const { error } = await this.supabase
      .from(this.table)
      .upsert(template, { onConflict: 'host,path' });

    if (error) {
      throw new Error(`TemplateStore.save failed: ${error.message}`);
    }

    TemplateStore.logSaved(template, mappings.length);
    return template;
  }

  // ── Static helpers ────────────────────────────────────────────────────

  /** The row `save` writes: normalized mappings, `created_at` carried over from `existing`. */
  static buildTemplate(
    targetUrl: string,
    fieldsSnapshot: FieldDescriptor[],
    mappings: RawFieldMapping[],
    source: string,
    existing: MappingTemplate | null,
    now = new Date(),
  ): MappingTemplate {
    const { host, path } = TemplateStore.normalizeUrlParts(targetUrl);
    if (!host) {
      throw new InvalidTargetError('target_url is required for mapping template save.');
    }
    const stamp = now.toISOString();
    const normalized = TemplateStore.normalizeMappings(mappings);
    return {
      host,
      path,
      source,
      valid: true,
      fields_snapshot: fieldsSnapshot,
      fields_count: fieldsSnapshot.length,
      mappings: normalized,
      mappings_count: normalized.length,
      created_at: existing?.created_at || stamp,
      updated_at: stamp,
    };
  }

  static logSaved(template: MappingTemplate, submitted: number): void {
    getLogger().info('Mapping template saved', {
      host: template.host,
      path: template.path,
      source: template.source,
      mappings_count: template.mappings_count,
      dropped: submitted - template.mappings_count,
    });
  }

  /** Lower-cased host and path; path defaults to `/`. Unparseable URLs yield an empty host. */
  static normalizeUrlParts(targetUrl: string): { host: string; path: string } {
    const raw = (targetUrl ?? '').trim();
    if (!URL.canParse(raw)) return { host: '', path: '/' };
    const url = new URL(raw);
    return { host: url.host.toLowerCase(), path: (url.pathname || '/').toLowerCase() };
  }

  /**
   * Drop invalid mappings and fill defaults.
   *
   * Unknown kinds become `text`. Checkbox/radio need both `match_value` and
   * `checked_when`; text/select need a `canonical_key`.
   */
  static normalizeMappings(mappings: RawFieldMapping[]): FieldMapping[] {
    const out: FieldMapping[] = [];
    for (const item of mappings ?? []) {
      const selector = (item.selector ?? '').trim();
      const canonicalKey = (item.canonical_key ?? '').trim();
      const rawKind = (item.field_kind ?? 'text').trim().toLowerCase();
      const matchValue = (item.match_value ?? '').trim();
      const checkedWhen = (item.checked_when ?? '').trim();
      if (!selector) continue;

      const fieldKind = isFieldKind(rawKind) ? rawKind : 'text';
      if (isCheckKind(fieldKind) && !(matchValue && checkedWhen)) continue;
      if (!isCheckKind(fieldKind) && !canonicalKey) continue;

      out.push({
        selector,
        canonical_key: canonicalKey,
        field_kind: fieldKind,
        match_value: matchValue,
        checked_when: checkedWhen,
        confidence: item.confidence ?? 1,
        source: item.source || 'user',
      });
    }
    return out;
  }
}
