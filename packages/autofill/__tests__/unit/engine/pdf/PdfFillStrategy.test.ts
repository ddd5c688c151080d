import { describe, expect, test, beforeEach } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { parseApplicantPayload } from '../../../../src/canonical/payload.js';
import {
  fillPdfDocument,
  NO_MATCHED_FIELDS_WARNING,
  NO_WIDGETS_FILLED_WARNING,
} from '../../../../src/engine/pdf/PdfFillStrategy.js';
import { UnresolvedRequiredFieldError } from '../../../../src/errors.js';
import type { FieldMapping } from '../../../../src/mapping/types.js';
import { buildFormPdf, tempOutDir, type FixtureField } from './pdfFixtures.js';

const FORM: FixtureField[] = [
  { kind: 'text', name: 'Primer Apellido', x: 50, y: 700 },
  { kind: 'text', name: 'nombre', x: 300, y: 700 },
  { kind: 'checkbox', name: 'H', x: 50, y: 600 },
  { kind: 'checkbox', name: 'M', x: 120, y: 600 },
  { kind: 'text', name: 'Observaciones', x: 50, y: 500 },
  { kind: 'dropdown', name: 'Provincia', x: 300, y: 500, options: ['MADRID', 'VALENCIA'] },
  { kind: 'checkbox', name: 'Acepto', x: 50, y: 400 },
];

const payload = parseApplicantPayload({
  identificacion: { nif_nie: 'X1234567L', primer_apellido: 'PETRENKO', nombre: 'IVAN' },
  domicilio: { cp: '28013' },
  extra: { sexo: 'M', email: 'ana@example.com' },
});

const fixedClock = () => new Date(2025, 4, 6, 7, 8, 9);

function mapping(overrides: Partial<FieldMapping>): FieldMapping {
  return {
    selector: '',
    canonical_key: '',
    field_kind: 'text',
    match_value: '',
    checked_when: '',
    confidence: 1,
    source: 'user',
    ...overrides,
  };
}

async function reload(path: string) {
  return (await PDFDocument.load(await readFile(path))).getForm();
}

describe('fillPdfDocument', () => {
  let outDir: string;
  let bytes: Uint8Array;

  beforeEach(async () => {
    outDir = await tempOutDir();
    bytes = await buildFormPdf(FORM);
  });

  test('heuristic fill by field names and sex box row', async () => {
    const result = await fillPdfDocument(bytes, payload, outDir, 'https://sede.example.es/m.pdf', { now: fixedClock });

    expect(result.mode).toBe('pdf');
    expect(result.adapter).toBe('pdf_acroform');
    expect(result.attempted_adapters).toEqual(['pdf_acroform']);
    expect(result.filled_fields).toEqual(['Primer Apellido', 'nombre', 'H', 'M', 'Provincia']);
    expect(result.applied_mappings).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(basename(result.artifacts.filled_document)).toBe('20250506_070809_target_filled.pdf');

    const form = await reload(result.artifacts.filled_document);
    expect(form.getTextField('Primer Apellido').getText()).toBe('PETRENKO');
    expect(form.getTextField('nombre').getText()).toBe('IVAN');
    expect(form.getCheckBox('H').isChecked()).toBe(false);
    expect(form.getCheckBox('M').isChecked()).toBe(true);
    expect(form.getDropdown('Provincia').getSelected()).toEqual(['MADRID']);
    expect(form.getTextField('Observaciones').getText()).toBeUndefined();
  });

  test('explicit mappings switch off name heuristics', async () => {
    const result = await fillPdfDocument(bytes, payload, outDir, 'https://sede.example.es/m.pdf', {
      now: fixedClock,
      explicitMappings: [
        mapping({ selector: 'pdf:Observaciones', canonical_key: 'email' }),
        mapping({ selector: 'pdf:Acepto', field_kind: 'checkbox', match_value: 'M', checked_when: "sexo == 'M'" }),
      ],
    });

    expect(result.filled_fields).toEqual(['H', 'M', 'Observaciones', 'Acepto']);
    expect(result.applied_mappings).toEqual([
      {
        selector: 'pdf:Observaciones',
        canonical_key: 'email',
        field_kind: 'text',
        source: 'explicit',
        confidence: 1,
        reason: 'rule_evaluated_true',
      },
      {
        selector: 'pdf:Acepto',
        canonical_key: '',
        field_kind: 'checkbox',
        source: 'user',
        confidence: 1,
        reason: 'rule_evaluated_true',
      },
    ]);

    const form = await reload(result.artifacts.filled_document);
    expect(form.getTextField('Observaciones').getText()).toBe('ana@example.com');
    expect(form.getTextField('Primer Apellido').getText()).toBeUndefined();
    expect(form.getCheckBox('Acepto').isChecked()).toBe(true);
  });

  test('strict mode writes only mapped fields', async () => {
    const strictBytes = await buildFormPdf([
      { kind: 'text', name: 'Email', x: 50, y: 700 },
      { kind: 'checkbox', name: 'Sexo_Mujer', x: 50, y: 600 },
      { kind: 'text', name: 'Nombre y apellidos del titular', x: 50, y: 500 },
    ]);

    const result = await fillPdfDocument(strictBytes, payload, outDir, 'https://sede.example.es/m.pdf', {
      strict: true,
      explicitMappings: [mapping({ selector: 'pdf:Email', canonical_key: 'email' })],
    });

    expect(result.filled_fields).toEqual(['Email']);
    const form = await reload(result.artifacts.filled_document);
    expect(form.getCheckBox('Sexo_Mujer').isChecked()).toBe(false);
    expect(form.getTextField('Nombre y apellidos del titular').getText()).toBeUndefined();
  });

  test('a false rule unchecks and is audited as such', async () => {
    const result = await fillPdfDocument(bytes, payload, outDir, 'https://sede.example.es/m.pdf', {
      explicitMappings: [
        mapping({ selector: 'pdf:Acepto', field_kind: 'checkbox', match_value: 'H', checked_when: "sexo == 'H'", confidence: 0.9 }),
      ],
    });

    expect(result.applied_mappings).toEqual([
      {
        selector: 'pdf:Acepto',
        canonical_key: '',
        field_kind: 'checkbox',
        source: 'user',
        confidence: 0.9,
        reason: 'rule_evaluated_false',
      },
    ]);
  });

  test('identity boxes are split', async () => {
    const nifBytes = await buildFormPdf([
      { kind: 'text', name: 'nie_letra', x: 100, y: 700, width: 20 },
      { kind: 'text', name: 'nie_numero', x: 130, y: 700, width: 120 },
      { kind: 'text', name: 'nie_control', x: 260, y: 700, width: 20 },
    ]);
    const explicitMappings = ['nie_letra', 'nie_numero', 'nie_control'].map((name) =>
      mapping({ selector: `pdf:${name}`, canonical_key: 'nif_nie' }),
    );

    const result = await fillPdfDocument(nifBytes, payload, outDir, 'https://sede.example.es/m.pdf', { explicitMappings });

    const form = await reload(result.artifacts.filled_document);
    expect(form.getTextField('nie_letra').getText()).toBe('X');
    expect(form.getTextField('nie_numero').getText()).toBe('1234567');
    expect(form.getTextField('nie_control').getText()).toBe('L');
    expect(result.applied_mappings.map((m) => m.canonical_key)).toEqual([
      'nif_nie_prefix',
      'nif_nie_number',
      'nif_nie_suffix',
    ]);
  });

  test('a form without widgets still saves and warns', async () => {
    const result = await fillPdfDocument(await buildFormPdf([]), payload, outDir, 'https://sede.example.es/m.pdf');

    expect(result.filled_fields).toEqual([]);
    expect(result.warnings).toEqual([NO_MATCHED_FIELDS_WARNING, NO_WIDGETS_FILLED_WARNING]);
    expect(result.artifacts.filled_document).not.toBe('');
  });

  test('a complementary return needs an amount when one is bound', async () => {
    const complementary = parseApplicantPayload({ autoliquidacion: { tipo: 'Complementaria' } });

    await expect(
      fillPdfDocument(bytes, complementary, outDir, 'https://sede.example.es/m.pdf', {
        explicitMappings: [mapping({ selector: 'pdf:Importe', canonical_key: 'importe_euros' })],
      }),
    ).rejects.toBeInstanceOf(UnresolvedRequiredFieldError);
  });
});
