import { describe, expect, test } from 'vitest';
import { parseApplicantPayload } from '../../../src/canonical/payload.js';
import { buildCanonicalFieldMap } from '../../../src/canonical/valueMap.js';
import { inferPdfCheckboxExpected, pdfValueForField } from '../../../src/engine/pdf/pdfHeuristics.js';

const values = buildCanonicalFieldMap(
  parseApplicantPayload({
    identificacion: { nif_nie: 'X1234567L', primer_apellido: 'PETRENKO', nombre: 'IVAN' },
    domicilio: { piso: '2', puerta: 'A', cp: '28013' },
    extra: { fecha_nacimiento: '15/07/1990', sexo: 'M', estado_civil: 'SP', hijos_escolarizacion_espana: 'si' },
  }),
);

describe('pdfValueForField', () => {
  test.each([
    ['Nombre y apellidos del titular', 'IVAN PETRENKO'],
    ['Piso/Puerta', '2 A'],
    ['NIE', 'X1234567L'],
    ['Primer Apellido', 'PETRENKO'],
    ['nombre', 'IVAN'],
    ['Apellidos', 'PETRENKO IVAN'],
    ['FechaNacimiento', '15/07/1990'],
    ['CP', '28013'],
    ['Observaciones', ''],
    ['', ''],
  ])('%j', (fieldName, expected) => {
    expect(pdfValueForField(fieldName, values)).toBe(expected);
  });
});

describe('inferPdfCheckboxExpected', () => {
  test('conventional sex box names', () => {
    expect(inferPdfCheckboxExpected('M', '', values)).toBe(true);
    expect(inferPdfCheckboxExpected('CHKBOX', '', values)).toBe(false);
    expect(inferPdfCheckboxExpected('sexo_h', 'sexo', values)).toBe(false);
  });

  test('marital status boxes', () => {
    expect(inferPdfCheckboxExpected('SP', '', values)).toBe(true);
    expect(inferPdfCheckboxExpected('CHKBOX-0', '', values)).toBe(false);
    expect(inferPdfCheckboxExpected('estado_civil_sp', 'estado_civil', values)).toBe(true);
  });

  test('children schooling boxes', () => {
    expect(inferPdfCheckboxExpected('Hijos escolarizados', '', values)).toBe(true);
    expect(inferPdfCheckboxExpected('NO', '', values)).toBe(false);
  });

  test('without name conventions only the mapped key counts', () => {
    expect(inferPdfCheckboxExpected('Sexo_Mujer', '', values, false)).toBeNull();
    expect(inferPdfCheckboxExpected('M', '', values, false)).toBeNull();
    expect(inferPdfCheckboxExpected('sexo_h', 'sexo', values, false)).toBe(false);
  });

  test('unrecognized names are left alone', () => {
    expect(inferPdfCheckboxExpected('Casilla12', '', values)).toBeNull();
  });
});
