import { describe, expect, test } from 'vitest';
import { parseApplicantPayload } from '../../../src/canonical/payload.js';
import { buildCanonicalFieldMap } from '../../../src/canonical/valueMap.js';
import { CANONICAL_FIELD_KEYS } from '../../../src/canonical/vocabulary.js';

function payload(raw: Record<string, unknown>) {
  return parseApplicantPayload(raw);
}

describe('buildCanonicalFieldMap', () => {
  test('every vocabulary key is present for an empty payload', () => {
    const values = buildCanonicalFieldMap(payload({}));
    expect(Object.keys(values).sort()).toEqual([...CANONICAL_FIELD_KEYS].sort());
    expect(Object.values(values).every((v) => v === '')).toBe(true);
  });

  test('splits a foreign full name and identity number', () => {
    const values = buildCanonicalFieldMap(
      payload({
        identificacion: { nif_nie: 'y1234567x', nombre_apellidos: 'KOVALENKO OLENA' },
        extra: { nacionalidad: 'UKR' },
      }),
    );
    expect(values.nif_nie).toBe('Y1234567X');
    expect(values.nif_nie_prefix).toBe('Y');
    expect(values.nif_nie_number).toBe('1234567');
    expect(values.nif_nie_suffix).toBe('X');
    expect(values.primer_apellido).toBe('KOVALENKO');
    expect(values.segundo_apellido).toBe('');
    expect(values.nombre).toBe('OLENA');
    expect(values.nombre_apellidos).toBe('KOVALENKO OLENA');
  });

  test('explicit name parts override the split', () => {
    const values = buildCanonicalFieldMap(
      payload({
        identificacion: {
          nombre_apellidos: 'GARCIA LOPEZ MARIA',
          primer_apellido: 'GARCÍA',
          segundo_apellido: 'LÓPEZ',
          nombre: 'MARÍA',
        },
      }),
    );
    expect(values.nombre_apellidos).toBe('GARCÍA LÓPEZ MARÍA');
  });

  test('decomposes the street line and composes floor/door', () => {
    const values = buildCanonicalFieldMap(
      payload({
        domicilio: { tipo_via: 'Calle', nombre_via: 'Mayor Núm. 12 Piso 5C', cp: '28013' },
      }),
    );
    expect(values.nombre_via).toBe('Mayor');
    expect(values.numero).toBe('12');
    expect(values.piso).toBe('5');
    expect(values.puerta).toBe('C');
    expect(values.piso_puerta).toBe('5 C');
    expect(values.domicilio_en_espana).toBe('Calle Mayor');
    expect(values.provincia).toBe('MADRID');
  });

  test('explicit province wins over the postal code', () => {
    const values = buildCanonicalFieldMap(payload({ domicilio: { provincia: 'TOLEDO', cp: '28013' } }));
    expect(values.provincia).toBe('TOLEDO');
  });

  test('date parts and amount fallbacks', () => {
    const values = buildCanonicalFieldMap(
      payload({
        declarante: { fecha: '02/01/2025' },
        extra: { fecha_nacimiento: '1988-11-30' },
        autoliquidacion: { importe: 12.5 },
      }),
    );
    expect([values.fecha_dia, values.fecha_mes, values.fecha_anio]).toEqual(['02', '01', '2025']);
    expect([values.fecha_nacimiento_dia, values.fecha_nacimiento_mes, values.fecha_nacimiento_anio]).toEqual([
      '30',
      '11',
      '1988',
    ]);
    expect(values.importe_euros).toBe('12.5');
  });
});
