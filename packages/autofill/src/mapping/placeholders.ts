/**
 * `{canonical_key}` placeholders.
 *
 * A form author can pre-fill an input or PDF field with `{nombre}` (or a
 * composite such as `{tipo_via} {nombre_via}`) to declare its binding.
 */

import { isCanonicalFieldKey, type CanonicalFieldKey } from '../canonical/vocabulary.js';
import type { FieldMapping } from './types.js';

const PLACEHOLDER_RE = /^\{([a-z_]+)\}$/i;
const PLACEHOLDER_TOKEN_RE = /\{([a-z_]+)\}/gi;

/** Exact `{key}` value → key, when the key is in the vocabulary. */
export function canonicalFromPlaceholder(value: string): CanonicalFieldKey | '' {
  const m = PLACEHOLDER_RE.exec((value ?? '').trim());
  if (!m) return '';
  const key = (m[1] ?? '').toLowerCase();
  return isCanonicalFieldKey(key) ? key : '';
}

/** Key named by an exact `{key}` value whatever the vocabulary says, else `''`. */
export function placeholderName(value: string): string {
  const m = PLACEHOLDER_RE.exec((value ?? '').trim());
  return m ? (m[1] ?? '').toLowerCase() : '';
}

/** Unique known and unknown keys of every `{key}` token, in order of appearance. */
export function placeholderTokens(value: string): { known: CanonicalFieldKey[]; unknown: string[] } {
  const known: CanonicalFieldKey[] = [];
  const unknown: string[] = [];
  for (const m of (value ?? '').matchAll(PLACEHOLDER_TOKEN_RE)) {
    const key = (m[1] ?? '').toLowerCase();
    if (isCanonicalFieldKey(key)) {
      if (!known.includes(key)) known.push(key);
    } else if (!unknown.includes(key)) {
      unknown.push(key);
    }
  }
  return { known, unknown };
}

/** Pick the single key a composite placeholder stands for. */
export function selectCompositeKey(keys: CanonicalFieldKey[]): CanonicalFieldKey | '' {
  if (keys.length === 0) return '';
  const set = new Set<string>(keys);
  if (set.has('domicilio_en_espana') || (set.has('tipo_via') && set.has('nombre_via'))) {
    return 'domicilio_en_espana';
  }
  if (set.has('nombre_apellidos') || (set.has('nombre') && set.has('primer_apellido'))) {
    return 'nombre_apellidos';
  }
  return keys[0] ?? '';
}

// ── Extraction ───────────────────────────────────────────────────────────

export interface PlaceholderValue {
  selector: string;
  value: string;
}

export interface PlaceholderExtraction {
  mappings: FieldMapping[];
  unknown: string[];
}

function textMapping(selector: string, key: CanonicalFieldKey, source: string, confidence: number): FieldMapping {
  return {
    selector,
    canonical_key: key,
    field_kind: 'text',
    match_value: '',
    checked_when: '',
    source,
    confidence,
  };
}

/** HTML inputs: only whole-value placeholders bind. */
export function htmlPlaceholderMappings(rows: PlaceholderValue[]): PlaceholderExtraction {
  const mappings: FieldMapping[] = [];
  const unknown = new Set<string>();
  for (const row of rows) {
    const selector = row.selector.trim();
    const value = row.value.trim();
    if (!selector || !value) continue;
    const key = canonicalFromPlaceholder(value);
    if (key) {
      mappings.push(textMapping(selector, key, 'placeholder', 1));
      continue;
    }
    const name = placeholderName(value);
    if (name) unknown.add(name);
  }
  return { mappings, unknown: [...unknown].sort() };
}

/**
 * PDF widgets: whole-value placeholders bind at 0.7, composites at 0.65.
 * `source` is `template_pdf` for uploaded bytes, `placeholder` for a fetched URL.
 */
export function pdfPlaceholderMappings(
  rows: PlaceholderValue[],
  source: 'template_pdf' | 'placeholder' = 'template_pdf',
): PlaceholderExtraction {
  const mappings: FieldMapping[] = [];
  const unknown = new Set<string>();
  for (const row of rows) {
    const value = row.value.trim();
    if (!row.selector || !value) continue;
    const key = canonicalFromPlaceholder(value);
    if (key) {
      mappings.push(textMapping(row.selector, key, source, 0.7));
      continue;
    }
    const tokens = placeholderTokens(value);
    const selected = selectCompositeKey(tokens.known);
    if (selected) {
      mappings.push(textMapping(row.selector, selected, source, tokens.known.length > 1 ? 0.65 : 0.7));
    }
    for (const name of tokens.unknown) unknown.add(name);
  }
  return { mappings, unknown: [...unknown].sort() };
}
