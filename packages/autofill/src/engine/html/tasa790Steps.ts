/**
 * Steps for the police fee form (modelo 790 código 012).
 *
 * The form is one long page: identity and address text boxes, the
 * autoliquidación kind, a table per trámite group with one radio per option,
 * the declarant's place and date, and the payment method.
 */

import type { Locator, Page } from 'playwright-core';
import type { ApplicantPayload } from '../../canonical/payload.js';
import type { CanonicalFieldKey, CanonicalFieldMap } from '../../canonical/vocabulary.js';
import { UnresolvedRequiredFieldError, errorMessage } from '../../errors.js';
import { getLogger } from '../../monitoring/logger.js';
import { type FilledFields, writeField } from './adapters/types.js';
import { fillByLabel, selectByLabel } from './fieldWriters.js';

// ── Types ────────────────────────────────────────────────────────────────

export const TASA_790_012_FORM_URL = 'https://sede.policia.gob.es/Tasa790_012/ImpresoRellenar';

export type TramiteSelection = NonNullable<ApplicantPayload['tramite']>;

export interface TramiteGroup {
  group: string;
  options: string[];
}

export interface MainSectionOptions {
  /** Pick the trámite radio too; the manual hand-off leaves it to the user. */
  selectTramite: boolean;
}

type PaymentMethod = 'adeudo' | 'efectivo';

interface LabelledField {
  key: CanonicalFieldKey;
  label: string;
  pattern: RegExp;
  mandatory: boolean;
  select?: boolean;
}

const MAIN_FIELDS: LabelledField[] = [
  { key: 'nif_nie', label: 'N.I.F./N.I.E.', pattern: /N\.?I\.?F\.?\s*\/\s*N\.?I\.?E/i, mandatory: true },
  {
    key: 'nombre_apellidos',
    label: 'Apellidos y nombre o razón social',
    pattern: /Apellidos y nombre/i,
    mandatory: true,
  },
  { key: 'tipo_via', label: 'Tipo de vía', pattern: /Tipo de v[ií]a/i, mandatory: true, select: true },
  { key: 'nombre_via', label: 'Nombre de la vía pública', pattern: /Nombre de la v[ií]a p[uú]blica/i, mandatory: true },
  { key: 'numero', label: 'Núm.', pattern: /^N[uú]m\b/i, mandatory: true },
  { key: 'escalera', label: 'Escalera', pattern: /Escalera/i, mandatory: false },
  { key: 'piso', label: 'Piso', pattern: /Piso/i, mandatory: false },
  { key: 'puerta', label: 'Puerta', pattern: /Puerta/i, mandatory: false },
  { key: 'telefono', label: 'Teléfono', pattern: /Tel[eé]fono/i, mandatory: false },
  { key: 'municipio', label: 'Municipio', pattern: /Municipio/i, mandatory: true },
  { key: 'provincia', label: 'Provincia', pattern: /Provincia/i, mandatory: true, select: true },
  { key: 'cp', label: 'Código Postal', pattern: /C[oó]digo Postal/i, mandatory: true },
  { key: 'localidad', label: 'Localidad', pattern: /Localidad/i, mandatory: true },
  { key: 'fecha', label: 'Fecha', pattern: /^Fecha/i, mandatory: false },
];

// Justificante boxes pre-printed with the model's fixed digits.
const FIXED_DIGIT_PLACEHOLDERS = new Set(['7', '9', '0', '1', '2']);
const MIN_JUSTIFICANTE_BOXES = 7;

// Options priced per unit need a quantity in their row.
const QUANTITY_MARKERS = ['cada día', 'certificados o informes', 'por cada documento'];

const collapse = (value: string) => value.replace(/\s+/g, ' ').trim();
const norm = (value: string) => collapse(value).toLowerCase();
const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// ── Amounts ──────────────────────────────────────────────────────────────

/** Split an amount such as "12,5" or "1234.56" into euros and two-digit cents. */
export function splitAmount(raw: string): [euros: string, cents: string] {
  const value = Number(raw.trim().replace(',', '.'));
  if (!raw.trim() || !Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid amount: ${raw}`);
  }
  const totalCents = Math.round(value * 100);
  return [String(Math.floor(totalCents / 100)), String(totalCents % 100).padStart(2, '0')];
}

// ── Radios ───────────────────────────────────────────────────────────────

/** Check the radio whose label (or enclosing cell) reads `text`. */
export async function selectRadioByText(page: Page, text: string): Promise<void> {
  const pattern = new RegExp(escapeRegExp(text), 'i');
  const candidates: Array<() => Locator> = [
    () => page.getByRole('radio', { name: pattern }),
    () => page.locator('label').filter({ hasText: pattern }).locator("input[type='radio']"),
    () => page.locator('td').filter({ hasText: pattern }).locator("input[type='radio']"),
  ];
  for (const candidate of candidates) {
    const radio = candidate().first();
    if ((await radio.count()) === 0) continue;
    await radio.check();
    return;
  }
  throw new Error(`No radio found for "${text}".`);
}

// ── Autoliquidación ──────────────────────────────────────────────────────

async function editableBoxes(scope: Locator, skipFixed: boolean): Promise<Locator[]> {
  const boxes: Locator[] = [];
  const total = await scope.count();
  for (let i = 0; i < total; i++) {
    const box = scope.nth(i);
    const placeholder = ((await box.getAttribute('placeholder')) ?? '').trim();
    if (skipFixed && FIXED_DIGIT_PLACEHOLDERS.has(placeholder)) continue;
    boxes.push(box);
  }
  return boxes;
}

/** Justificante digits and the complementary amount for a complementaria. */
export async function fillComplementaria(page: Page, payload: ApplicantPayload): Promise<void> {
  const numJustificante = payload.autoliquidacion?.num_justificante ?? '';
  const amount = payload.autoliquidacion?.importe_complementaria ?? '';
  if (!numJustificante || !amount) {
    throw new UnresolvedRequiredFieldError(
      'autoliquidacion',
      'Complementaria selected but num_justificante/importe_complementaria are missing.',
    );
  }

  const textBoxes = "input[type='text']:enabled";
  let boxes = await editableBoxes(page.locator(textBoxes), true);
  if (boxes.length < MIN_JUSTIFICANTE_BOXES) {
    const block = page.locator('div').filter({ hasText: /Num\.?\s*Justificante/i }).first();
    boxes = await editableBoxes(block.locator(textBoxes), false);
  }
  if (boxes.length < MIN_JUSTIFICANTE_BOXES) {
    throw new Error('Could not locate editable Num. Justificante fields.');
  }

  const digits = numJustificante.replace(/\D/g, '');
  for (const [i, box] of boxes.entries()) {
    if (i >= digits.length) break;
    await box.fill(digits.charAt(i));
  }

  const [euros, cents] = splitAmount(amount);
  await fillByLabel(page, [/parte entera/i], euros);
  await fillByLabel(page, [/parte decimal/i], cents);
}

/** Principal unless the payload asks for a complementaria. */
export async function selectAutoliquidacion(page: Page, payload: ApplicantPayload): Promise<void> {
  const kind = (payload.autoliquidacion?.tipo || 'principal').toLowerCase();
  if (kind === 'complementaria') {
    await selectRadioByText(page, 'Complementaria');
    await fillComplementaria(page, payload);
    return;
  }
  await selectRadioByText(page, 'Principal');
}

// ── Trámite ──────────────────────────────────────────────────────────────

async function findGroupTable(page: Page, group: string): Promise<Locator> {
  const wanted = norm(group);
  const tables = page.locator('table');
  const total = await tables.count();
  for (let i = 0; i < total; i++) {
    const table = tables.nth(i);
    const header = table.locator('th').first();
    if ((await header.count()) === 0) continue;
    if (norm(await header.innerText()).includes(wanted)) return table;
  }
  throw new Error(`No trámite group table matched: ${group}`);
}

/** Check the option's radio inside its group table, with a quantity where the row asks for one. */
export async function selectTramite(page: Page, tramite: TramiteSelection): Promise<void> {
  if (!tramite.grupo || !tramite.opcion) {
    throw new UnresolvedRequiredFieldError('tramite', 'tramite.grupo and tramite.opcion are required.');
  }
  const table = await findGroupTable(page, tramite.grupo);
  const row = table
    .locator('tr')
    .filter({ hasText: new RegExp(escapeRegExp(tramite.opcion), 'i') })
    .first();
  if ((await row.count()) === 0) throw new Error(`No trámite option row matched: ${tramite.opcion}`);
  await row.locator("input[type='radio']").first().check();

  const rowText = norm(await row.innerText());
  if (!QUANTITY_MARKERS.some((marker) => rowText.includes(marker))) return;
  const quantity = tramite.cantidad || tramite.dias;
  if (!quantity) {
    throw new UnresolvedRequiredFieldError('tramite', 'Selected trámite requires tramite.cantidad or tramite.dias.');
  }
  const input = row.locator("input[type='text'], input:not([type])").first();
  if ((await input.count()) === 0) throw new Error(`No quantity input in trámite row: ${tramite.opcion}`);
  await input.fill(quantity);
}

/** Every trámite group on the page with the options it offers. */
export async function readTramiteCatalog(page: Page): Promise<TramiteGroup[]> {
  const raw = await page.evaluate(() =>
    Array.from(document.querySelectorAll('table')).map((table) => ({
      group: table.querySelector('th')?.textContent ?? '',
      options: Array.from(table.querySelectorAll('tr'))
        .filter((row) => row.querySelector("input[type='radio']") !== null)
        .map((row) => row.querySelector('td')?.textContent ?? ''),
    })),
  );

  const catalog: TramiteGroup[] = [];
  for (const entry of raw) {
    const group = collapse(entry.group);
    const options = [...new Set(entry.options.map(collapse).filter(Boolean))];
    if (group && options.length > 0) catalog.push({ group, options });
  }
  return catalog;
}

// ── Forma de pago ────────────────────────────────────────────────────────

/** Check the payment radio in the INGRESO block, then the IBAN for a direct debit. */
export async function selectFormaPago(page: Page, method: PaymentMethod): Promise<void> {
  const selected = await page.evaluate((wanted) => {
    const text = (el: Element | null) => (el?.textContent ?? '').replace(/\s+/g, ' ').trim().toLowerCase();
    const blocks = Array.from(document.querySelectorAll('div')).filter((div) => {
      const t = text(div);
      return t.includes('forma de pago') && (t.includes('efectivo') || t.includes('adeudo'));
    });
    const block = blocks.find((div) => !blocks.some((other) => other !== div && div.contains(other)));
    if (!block) return false;
    const radios = Array.from(block.querySelectorAll<HTMLInputElement>("input[type='radio']"));
    const pick =
      radios.find((radio) => text(radio.closest('label, span, td, tr, div')).includes(wanted)) ??
      radios[wanted === 'adeudo' ? 1 : 0];
    if (!pick) return false;
    pick.checked = true;
    for (const type of ['click', 'input', 'change']) {
      pick.dispatchEvent(new Event(type, { bubbles: true }));
    }
    return pick.checked;
  }, method);
  if (!selected) throw new Error('Unable to select forma de pago (efectivo/adeudo).');
}

const isFormaPagoChecked = (page: Page) =>
  page.evaluate(() =>
    Array.from(document.querySelectorAll('div'))
      .filter((div) => (div.textContent ?? '').toLowerCase().includes('forma de pago'))
      .some((div) => div.querySelector("input[type='radio']:checked") !== null),
  );

// ── Sections ─────────────────────────────────────────────────────────────

export function paymentMethod(values: CanonicalFieldMap): PaymentMethod {
  return values.forma_pago.toLowerCase().includes('adeudo') ? 'adeudo' : 'efectivo';
}

/**
 * Identity, address, autoliquidación, optionally the trámite, declarant and
 * payment. Missing required choices throw; text boxes are best-effort.
 */
export async function fillTasa790MainSections(
  page: Page,
  values: CanonicalFieldMap,
  payload: ApplicantPayload,
  filled: FilledFields,
  opts: MainSectionOptions,
): Promise<void> {
  for (const field of MAIN_FIELDS) {
    await writeField(filled, field.key, values[field.key], async (v) =>
      (field.select === true && (await selectByLabel(page, [field.pattern], v))) ||
      fillByLabel(page, [field.pattern], v),
    );
  }

  await selectAutoliquidacion(page, payload);
  if (opts.selectTramite && payload.tramite?.grupo) {
    await selectTramite(page, payload.tramite);
  }

  if (!filled.has('forma_pago')) {
    const method = paymentMethod(values);
    await selectFormaPago(page, method);
    filled.add('forma_pago');
    if (method === 'adeudo') {
      await writeField(filled, 'iban', values.iban, (v) => fillByLabel(page, [/C[oó]digo IBAN/i], v));
    }
  }
}

/** Problems a submit would reject: empty mandatory boxes, no radio, no payment method. */
export async function mandatoryPageChecks(page: Page): Promise<string[]> {
  const issues: string[] = [];
  for (const field of MAIN_FIELDS) {
    if (!field.mandatory) continue;
    const loc = page.getByLabel(field.pattern).first();
    try {
      if ((await loc.count()) === 0) continue;
      if (!(await loc.inputValue()).trim()) issues.push(`Field empty on page: ${field.label}`);
    } catch (err) {
      getLogger().debug('Mandatory field unreadable', { label: field.label, error: errorMessage(err) });
    }
  }
  if ((await page.locator("input[type='radio']:checked").count()) === 0) {
    issues.push('No radio selected for trámite/sections.');
  }
  if (!(await isFormaPagoChecked(page))) issues.push('Forma de pago is not selected.');
  return issues;
}
