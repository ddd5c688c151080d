/**
 * Mapping types shared by the template store, resolver and fill strategies.
 *
 * A FieldMapping binds one target field (CSS selector, or `pdf:<name>` for a
 * document widget) to a canonical key, or to a `checked_when` rule for
 * checkbox/radio controls.
 */

import { z } from 'zod';

// ── FieldMapping ─────────────────────────────────────────────────────────

export const FIELD_KINDS = ['text', 'select', 'checkbox', 'radio'] as const;
export const FieldKindSchema = z.enum(FIELD_KINDS);
export type FieldKind = z.infer<typeof FieldKindSchema>;

export function isFieldKind(value: string): value is FieldKind {
  return FieldKindSchema.safeParse(value).success;
}

export function isCheckKind(kind: string): kind is 'checkbox' | 'radio' {
  return kind === 'checkbox' || kind === 'radio';
}

export const FieldMappingSchema = z.object({
  selector: z.string(),
  canonical_key: z.string().default(''),
  field_kind: FieldKindSchema.default('text'),
  match_value: z.string().default(''),
  checked_when: z.string().default(''),
  confidence: z.number().default(1),
  source: z.string().default('user'),
});

export type FieldMapping = z.infer<typeof FieldMappingSchema>;

/** Mapping as supplied by a caller: anything may be missing or off-vocabulary. */
export interface RawFieldMapping {
  selector?: string | null;
  canonical_key?: string | null;
  field_kind?: string | null;
  match_value?: string | null;
  checked_when?: string | null;
  confidence?: number | null;
  source?: string | null;
}

// ── MappingTemplate ──────────────────────────────────────────────────────

export const FieldDescriptorSchema = z.object({
  selector: z.string(),
  tag: z.string().default(''),
  type: z.string().default(''),
  id: z.string().default(''),
  name: z.string().default(''),
  label: z.string().default(''),
  placeholder: z.string().default(''),
  aria_label: z.string().default(''),
  visible: z.boolean().default(true),
  pdf_field_name: z.string().optional(),
  pdf_label_guess: z.string().optional(),
  page_index: z.number().int().optional(),
  rect: z.object({ x0: z.number(), y0: z.number(), x1: z.number(), y1: z.number() }).optional(),
});

export type FieldDescriptor = z.infer<typeof FieldDescriptorSchema>;

export const MappingTemplateSchema = z.object({
  host: z.string(),
  path: z.string(),
  source: z.string().default('user'),
  valid: z.boolean().default(true),
  fields_snapshot: z.array(FieldDescriptorSchema).default([]),
  fields_count: z.number().int().default(0),
  mappings: z.array(FieldMappingSchema).default([]),
  mappings_count: z.number().int().default(0),
  created_at: z.string(),
  updated_at: z.string(),
});

export type MappingTemplate = z.infer<typeof MappingTemplateSchema>;

// ── Audit ────────────────────────────────────────────────────────────────

export type AppliedReason = 'rule_evaluated_true' | 'rule_evaluated_false' | 'cp_inferred_fallback';

export interface AppliedMapping {
  selector: string;
  canonical_key: string;
  field_kind: FieldKind;
  source: string;
  confidence: number;
  reason: AppliedReason;
}

// ── Suggestions ──────────────────────────────────────────────────────────

export type SuggestionSource = 'learned' | 'heuristic';

export type MappingSuggestion = FieldDescriptor & {
  canonical_key: string;
  field_kind: FieldKind;
  confidence: number;
  source: SuggestionSource;
  value_preview: string;
};
