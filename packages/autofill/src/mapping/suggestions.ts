import type { ApplicantPayload } from '../canonical/payload.js';
import { normalizeSignal } from '../canonical/normalizers.js';
import { buildCanonicalFieldMap } from '../canonical/valueMap.js';
import { canonicalPriority, isCanonicalFieldKey } from '../canonical/vocabulary.js';
import { readRecord } from '../data/load.js';
import type { FieldDescriptor, FieldKind, MappingSuggestion } from './types.js';

const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((v) => typeof v === 'string');

let _patterns: Array<[string, RegExp[]]> | null = null;

/** Signal patterns per canonical key, in file order (first key wins a tie). */
function keyPatterns(): Array<[string, RegExp[]]> {
  if (!_patterns) {
    _patterns = Object.entries(readRecord('suggestionPatterns.json', isStringList)).map(
      ([key, sources]) => [key, sources.map((src) => new RegExp(src))],
    );
  }
  return _patterns;
}

export function fieldKindFor(field: Pick<FieldDescriptor, 'type' | 'tag'>): FieldKind {
  const type = field.type.toLowerCase();
  if (type === 'radio') return 'radio';
  if (type === 'checkbox') return 'checkbox';
  if (field.tag.toLowerCase() === 'select') return 'select';
  return 'text';
}

/**
 * Score every pattern list against the field's label/name/id/placeholder/aria
 * signal and keep the best key. Returns `['', 0]` when nothing matches.
 */
export function scoreField(field: FieldDescriptor): [string, number] {
  const signal = normalizeSignal(
    [field.label, field.name, field.id, field.placeholder, field.aria_label].join(' '),
  );
  let bestKey = '';
  let bestScore = 0;
  for (const [key, patterns] of keyPatterns()) {
    const score = patterns.filter((re) => re.test(signal)).length;
    if (score > bestScore) {
      bestScore = score;
      bestKey = key;
    }
  }
  return [bestKey, bestScore];
}

/**
 * Propose a canonical key for each inspected field.
 *
 * A hint for the selector (from an earlier saved template) wins at 0.99;
 * otherwise the heuristic score maps to `min(0.85, 0.5 + 0.15 * score)`.
 */
export function suggestMappings(
  fields: FieldDescriptor[],
  payload: ApplicantPayload,
  hints: Record<string, string> = {},
): MappingSuggestion[] {
  const values = buildCanonicalFieldMap(payload);

  const suggestions = fields.map((field): MappingSuggestion => {
    const selector = field.selector.trim();
    const hint = hints[selector] ?? '';
    let canonicalKey = '';
    let confidence = 0;
    let source: MappingSuggestion['source'] = 'heuristic';

    if (isCanonicalFieldKey(hint)) {
      canonicalKey = hint;
      confidence = 0.99;
      source = 'learned';
    } else {
      const [key, score] = scoreField(field);
      if (score > 0) {
        canonicalKey = key;
        confidence = Math.min(0.85, 0.5 + score * 0.15);
      }
    }

    return {
      ...field,
      canonical_key: canonicalKey,
      field_kind: fieldKindFor(field),
      confidence: Math.round(confidence * 100) / 100,
      source,
      value_preview: isCanonicalFieldKey(canonicalKey) ? values[canonicalKey] : '',
    };
  });

  return suggestions.sort(
    (a, b) =>
      canonicalPriority(a.canonical_key) - canonicalPriority(b.canonical_key) ||
      (a.selector < b.selector ? -1 : a.selector > b.selector ? 1 : 0),
  );
}
