/**
 * Geometric inference over PDF form widgets.
 *
 * Government forms often split one logical value across several boxes (an
 * identity number as letter | digits | letter, a date as dd | mm | yyyy) or
 * model a single choice as a row of checkboxes. These helpers turn box
 * positions into per-field assignments.
 */

import { splitDateParts } from '../../canonical/normalizers.js';
import type { CanonicalFieldMap } from '../../canonical/vocabulary.js';
import type { PdfFieldGeometry } from './PdfFormReader.js';

/** Boxes whose top edges differ by at most this many points share a row. */
export const ROW_TOLERANCE_PT = 25;

/** Identity boxes at most this wide hold a single letter. */
export const NARROW_BOX_MAX_WIDTH_PT = 40;

type Geometry = Pick<PdfFieldGeometry, 'name' | 'x0' | 'y0' | 'width' | 'isCheck'>;

const byRowThenX = (a: Geometry, b: Geometry) => a.y0 - b.y0 || a.x0 - b.x0;
const byX = (a: Geometry, b: Geometry) => a.x0 - b.x0;

function sameRow(a: Geometry, b: Geometry): boolean {
  return Math.abs(a.y0 - b.y0) <= ROW_TOLERANCE_PT;
}

function uniqueByName<T extends Geometry>(fields: T[]): T[] {
  const seen = new Set<string>();
  return fields.filter((f) => (seen.has(f.name) ? false : (seen.add(f.name), true)));
}

/**
 * Assign `nif_nie_prefix | nif_nie_number | nif_nie_suffix` to three boxes
 * explicitly mapped to `nif_nie`: the first wide box is the number, the narrow
 * boxes on its row (else the first two narrow boxes) flank it.
 */
export function buildNifSplitFieldMap(
  fields: Geometry[],
  explicitKeyByField: Map<string, string>,
  values: CanonicalFieldMap,
): Map<string, 'nif_nie_prefix' | 'nif_nie_number' | 'nif_nie_suffix'> {
  const out = new Map<string, 'nif_nie_prefix' | 'nif_nie_number' | 'nif_nie_suffix'>();
  if (!(values.nif_nie_prefix && values.nif_nie_number && values.nif_nie_suffix)) return out;

  const candidates = uniqueByName(fields.filter((f) => explicitKeyByField.get(f.name) === 'nif_nie'));
  if (candidates.length < 3) return out;

  const wide = candidates.filter((c) => c.width > NARROW_BOX_MAX_WIDTH_PT).sort(byRowThenX);
  const narrow = candidates.filter((c) => c.width <= NARROW_BOX_MAX_WIDTH_PT).sort(byRowThenX);
  const middle = wide[0];
  if (!middle || narrow.length < 2) return out;

  let left: Geometry | undefined;
  let right: Geometry | undefined;
  const rowNarrow = narrow.filter((c) => sameRow(c, middle)).sort(byX);
  if (rowNarrow.length >= 2) {
    left = rowNarrow[0];
    right = rowNarrow[rowNarrow.length - 1];
  } else {
    [left, right] = [narrow[0], narrow[1]].sort((a, b) => (a && b ? byX(a, b) : 0));
  }
  if (!left || !right) return out;

  out.set(left.name, 'nif_nie_prefix');
  out.set(middle.name, 'nif_nie_number');
  out.set(right.name, 'nif_nie_suffix');
  return out;
}

/**
 * Day/month/year values for three non-check boxes explicitly mapped to the
 * same date key, ordered left to right on the first row.
 */
export function buildDateSplitFieldValues(
  fields: Geometry[],
  explicitKeyByField: Map<string, string>,
  values: CanonicalFieldMap,
): Map<string, string> {
  const out = new Map<string, string>();
  for (const dateKey of ['fecha_nacimiento', 'fecha'] as const) {
    const { day, month, year } = splitDateParts(values[dateKey]);
    if (!(day && month && year)) continue;

    const candidates = fields
      .filter((f) => !f.isCheck && explicitKeyByField.get(f.name) === dateKey)
      .sort(byRowThenX);
    const first = candidates[0];
    if (!first || candidates.length < 3) continue;

    let row = candidates.filter((c) => sameRow(c, first));
    if (row.length < 3) row = candidates.slice(0, 3);
    row.sort(byX);

    const [d, m, y] = row;
    if (d) out.set(d.name, day);
    if (m) out.set(m.name, month);
    if (y) out.set(y.name, year);
  }
  return out;
}

/**
 * Checked state for a row of checkboxes encoding one choice.
 *
 * Boxes on the first visual row are read left to right against `order`; the
 * box whose code equals `selected` is checked. With `twoStateFallback` a row
 * of exactly two boxes is read as `H, M`.
 */
export function buildCheckboxGroupTargets(
  fields: Geometry[],
  groupNames: Set<string>,
  order: readonly string[],
  selected: string,
  twoStateFallback = false,
): Map<string, boolean> {
  const out = new Map<string, boolean>();
  const positioned = fields.filter((f) => f.isCheck && groupNames.has(f.name)).sort(byRowThenX);
  const first = positioned[0];
  if (!first) return out;

  const row = positioned.filter((f) => sameRow(f, first)).sort(byX);
  const effective = twoStateFallback && row.length === 2 && order.length >= 2 ? ['H', 'M'] : order;
  row.forEach((f, idx) => {
    const code = effective[idx];
    if (code !== undefined) out.set(f.name, selected === code);
  });
  return out;
}
