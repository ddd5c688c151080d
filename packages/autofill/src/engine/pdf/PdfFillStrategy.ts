/**
 * Document-resource fill strategy.
 *
 * Widgets are resolved in priority order:
 * 1. Sex / marital-status checkbox rows (geometric group inference)
 * 2. Explicit `checked_when` rules, then checkbox name conventions
 * 3. Split identity / date boxes, holder full name, explicit canonical keys
 * 4. Field-name heuristics (only with no explicit mappings and not strict)
 *
 * Name conventions in steps 2 and 3 apply in strict mode only to fields whose
 * mapped key they derive from.
 */

import { PDFBool, PDFCheckBox, PDFDropdown, PDFName, PDFRadioGroup, PDFTextField } from 'pdf-lib';
import { ArtifactWriter } from '../../artifacts/ArtifactWriter.js';
import { normalizeAsciiUpper, normText } from '../../canonical/normalizers.js';
import type { ApplicantPayload } from '../../canonical/payload.js';
import { buildCanonicalFieldMap } from '../../canonical/valueMap.js';
import { isCanonicalFieldKey, type CanonicalFieldMap } from '../../canonical/vocabulary.js';
import { getEnv, isDebugCaptureEnabled } from '../../config/env.js';
import { errorMessage, UnresolvedRequiredFieldError } from '../../errors.js';
import { buildRuleContext, evalCheckedWhen } from '../../mapping/checkedWhen.js';
import { isCheckKind, type AppliedMapping, type FieldKind, type FieldMapping } from '../../mapping/types.js';
import { getLogger, type Logger } from '../../monitoring/logger.js';
import { fetchDocument } from '../documentFetcher.js';
import type { HttpFetch } from '../targetClassifier.js';
import { emptyArtifacts, type FillOptions, type FillResult } from '../types.js';
import { loadPdfForm, type PdfFieldInfo } from './PdfFormReader.js';
import { fullNameForTitular, inferPdfCheckboxExpected, pdfValueForField } from './pdfHeuristics.js';
import { buildCheckboxGroupTargets, buildDateSplitFieldValues, buildNifSplitFieldMap } from './splitGroups.js';

export const PDF_ADAPTER_NAME = 'pdf_acroform';

export const NO_MATCHED_FIELDS_WARNING =
  'PDF has no matched fillable fields; saved original structure for manual completion.';
export const NO_WIDGETS_FILLED_WARNING = 'No PDF widgets were filled. Check mappings and field names.';

const SEX_ORDER = ['X', 'H', 'M'] as const;
const MARITAL_ORDER = ['S', 'C', 'V', 'D', 'SP'] as const;
const SEX_BOX_NAMES = new Set(['H', 'M', 'CHKBOX']);
const MARITAL_BOX_NAMES = new Set(['C', 'V', 'D', 'SP', 'CHKBOX-0']);

interface ExplicitPdfMapping {
  key: string;
  source: string;
  fieldKind: FieldKind;
  matchValue: string;
  checkedWhen: string;
  confidence: number;
}

/** Explicit mappings by bare PDF field name (`pdf:` prefix stripped). */
function explicitByField(mappings: FieldMapping[]): Map<string, ExplicitPdfMapping> {
  const out = new Map<string, ExplicitPdfMapping>();
  for (const item of mappings) {
    let name = item.selector.trim();
    if (name.startsWith('pdf:')) name = name.slice(4);
    if (!name) continue;
    out.set(name, {
      key: item.canonical_key.trim(),
      source: item.source.trim(),
      fieldKind: item.field_kind,
      matchValue: item.match_value.trim(),
      checkedWhen: item.checked_when.trim(),
      confidence: item.confidence,
    });
  }
  return out;
}

function checkGroupNames(
  fields: PdfFieldInfo[],
  explicit: Map<string, ExplicitPdfMapping>,
  key: 'sexo' | 'estado_civil',
  conventionalNames: Set<string>,
): Set<string> {
  const mapped = new Set<string>();
  for (const [name, meta] of explicit) {
    if (meta.key.toLowerCase() === key && isCheckKind(meta.fieldKind)) mapped.add(name);
  }
  if (mapped.size > 0) return mapped;
  return new Set(fields.filter((f) => f.isCheck && conventionalNames.has(f.name.toUpperCase())).map((f) => f.name));
}

function assertRequiredAmount(payload: ApplicantPayload, values: CanonicalFieldMap, explicit: Map<string, ExplicitPdfMapping>): void {
  if ((payload.autoliquidacion?.tipo ?? '').trim().toLowerCase() !== 'complementaria') return;
  const amountBound = [...explicit.values()].some((m) => m.key === 'importe_euros');
  if (amountBound && !values.importe_euros) {
    throw new UnresolvedRequiredFieldError(
      'importe_euros',
      'Complementary self-assessment requires an amount but none was provided.',
    );
  }
}

function setChecked(info: PdfFieldInfo, checked: boolean): void {
  const { field } = info;
  if (field instanceof PDFCheckBox) {
    if (checked) field.check();
    else field.uncheck();
  } else if (field instanceof PDFRadioGroup) {
    const [first] = field.getOptions();
    if (checked && first !== undefined) field.select(first);
    else field.clear();
  }
}

/** Returns false when the widget cannot hold `value` (unknown option, unsupported kind). */
function setValue(info: PdfFieldInfo, value: string, log: Logger): boolean {
  const { field } = info;
  if (field instanceof PDFTextField) {
    field.setText(value);
    return true;
  }
  if (field instanceof PDFDropdown) {
    const wanted = normalizeAsciiUpper(value);
    const option = field.getOptions().find((o) => normalizeAsciiUpper(o) === wanted);
    if (option === undefined) {
      log.warn('No matching dropdown option', { field: info.name });
      return false;
    }
    field.select(option);
    return true;
  }
  return false;
}

export interface PdfFillOptions extends FillOptions {
  /** Clock for artifact names. */
  now?: () => Date;
}

/**
 * Fill the AcroForm of `bytes` and write `{ts}_target_filled.pdf` into
 * `outDir`. `filled_fields` lists the PDF field names written.
 */
export async function fillPdfDocument(
  bytes: Uint8Array,
  payload: ApplicantPayload,
  outDir: string,
  targetUrl: string,
  opts: PdfFillOptions = {},
): Promise<FillResult> {
  const log = getLogger().child({ component: 'PdfFillStrategy' });
  const writer = new ArtifactWriter(outDir, opts.now);
  const artifacts = emptyArtifacts();

  const values = buildCanonicalFieldMap(payload);
  const explicit = explicitByField(opts.explicitMappings ?? []);
  assertRequiredAmount(payload, values, explicit);

  if (isDebugCaptureEnabled()) {
    artifacts.dom_snapshot = await writer.writeBytes(writer.fileNameFor('target_source', '.pdf'), bytes);
  }

  const { doc, fields } = await loadPdfForm(bytes);
  const strictExplicit = Boolean(opts.strict) || explicit.size > 0;

  const explicitKeys = new Map<string, string>();
  for (const [name, meta] of explicit) if (meta.key) explicitKeys.set(name, meta.key);
  const nifSplit = buildNifSplitFieldMap(fields, explicitKeys, values);
  const dateSplit = buildDateSplitFieldValues(fields, explicitKeys, values);

  const sexFields = checkGroupNames(fields, explicit, 'sexo', SEX_BOX_NAMES);
  const maritalFields = checkGroupNames(fields, explicit, 'estado_civil', MARITAL_BOX_NAMES);
  const sexTargets = buildCheckboxGroupTargets(fields, sexFields, SEX_ORDER, values.sexo.trim().toUpperCase(), true);
  const maritalTargets = buildCheckboxGroupTargets(
    fields,
    maritalFields,
    MARITAL_ORDER,
    values.estado_civil.trim().toUpperCase(),
  );

  const context = buildRuleContext(values);
  const touched: string[] = [];
  const applied: AppliedMapping[] = [];

  for (const info of fields) {
    const name = info.name;
    const meta = explicit.get(name);
    let mappedKey = meta?.key ?? '';
    let mappedSource = meta?.source ?? '';
    const splitKey = nifSplit.get(name);
    if (splitKey) {
      mappedKey = splitKey;
      mappedSource = 'nif_split_inferred';
    }

    try {
      if (info.isCheck) {
        const group = sexFields.has(name) ? sexTargets : maritalFields.has(name) ? maritalTargets : null;
        if (group) {
          setChecked(info, group.get(name) ?? false);
          touched.push(name);
          continue;
        }

        let expected: boolean | null = null;
        if (meta && isCheckKind(meta.fieldKind)) {
          const result = evalCheckedWhen(meta.checkedWhen, context);
          if (result !== null) expected = result && meta.matchValue !== '';
        }
        if (expected === null) expected = inferPdfCheckboxExpected(name, mappedKey, values, !strictExplicit);
        if (expected !== null) {
          setChecked(info, expected);
          touched.push(name);
          if (meta && isCheckKind(meta.fieldKind)) {
            applied.push({
              selector: `pdf:${name}`,
              canonical_key: mappedKey,
              field_kind: meta.fieldKind,
              source: mappedSource || 'explicit',
              confidence: meta.confidence || 1,
              reason: expected ? 'rule_evaluated_true' : 'rule_evaluated_false',
            });
          }
          continue;
        }
      }

      let value: string;
      const splitDate = dateSplit.get(name);
      if (splitDate !== undefined) {
        value = splitDate;
      } else if (
        normText(name).includes('nombreyapellidosdeltitular') &&
        (!strictExplicit || mappedKey === 'nombre_apellidos')
      ) {
        value = fullNameForTitular(values);
      } else if (isCanonicalFieldKey(mappedKey)) {
        value = values[mappedKey];
      } else if (strictExplicit) {
        continue;
      } else {
        value = pdfValueForField(name, values);
      }
      if (!value) continue;

      if (!setValue(info, value, log)) continue;
      touched.push(name);
      if (mappedKey) {
        applied.push({
          selector: `pdf:${name}`,
          canonical_key: mappedKey,
          field_kind: meta?.fieldKind ?? 'text',
          source: 'explicit',
          confidence: 1,
          reason: 'rule_evaluated_true',
        });
      }
    } catch (err) {
      log.error('Failed setting PDF field', { field: name, error: errorMessage(err) });
    }
  }

  const form = doc.getForm();
  form.acroForm.dict.set(PDFName.of('NeedAppearances'), PDFBool.True);
  if (getEnv().PDF_FLATTEN_WIDGETS) {
    try {
      form.flatten();
    } catch (err) {
      log.error('Failed flattening filled PDF', { error: errorMessage(err) });
    }
  }

  let output: Uint8Array;
  try {
    output = await doc.save();
  } catch (err) {
    // Non-Latin values cannot be encoded with the standard fonts; viewers
    // regenerate appearances from NeedAppearances instead.
    log.warn('Appearance update failed, saving without it', { error: errorMessage(err) });
    output = await doc.save({ updateFieldAppearances: false });
  }
  artifacts.filled_document = await writer.writeBytes(writer.fileNameFor('target_filled', '.pdf'), output);

  const warnings: string[] = [];
  if (touched.length === 0) {
    warnings.push(NO_MATCHED_FIELDS_WARNING);
    if (doc.getPageCount() > 0) warnings.push(NO_WIDGETS_FILLED_WARNING);
  }

  log.info('Document filled', { filled: touched.length, explicit: applied.length, fields: fields.length });

  return {
    mode: 'pdf',
    adapter: PDF_ADAPTER_NAME,
    attempted_adapters: [PDF_ADAPTER_NAME],
    filled_fields: touched,
    applied_mappings: applied,
    warnings,
    target_url: targetUrl,
    artifacts,
  };
}

/** Download the document at `targetUrl`, then fill it. */
export async function fillPdfTarget(
  payload: ApplicantPayload,
  targetUrl: string,
  outDir: string,
  opts: PdfFillOptions & { fetch?: HttpFetch; timeoutMs?: number } = {},
): Promise<FillResult> {
  const { bytes } = await fetchDocument(targetUrl, { fetch: opts.fetch, timeoutMs: opts.timeoutMs });
  return fillPdfDocument(bytes, payload, outDir, targetUrl, opts);
}
