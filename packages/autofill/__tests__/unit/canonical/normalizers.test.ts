import { describe, expect, test } from 'vitest';
import {
  composeFloorDoorToken,
  inferProvinceFromPostalCode,
  normalizeAsciiUpper,
  normalizeDoorToken,
  normalizeNationalityForSelect,
  normText,
  sanitizeFloorToken,
  splitAddressDetails,
  splitCompactFloorDoor,
  splitDateParts,
  splitIdentityNumber,
  splitNameForSpanishFields,
  stripExtraSpaces,
} from '../../../src/canonical/normalizers.js';

describe('text helpers', () => {
  test('stripExtraSpaces collapses whitespace and trims punctuation noise', () => {
    expect(stripExtraSpaces('  ,Calle   Mayor. ')).toBe('Calle Mayor');
  });

  test('normText keeps lower-case alphanumerics only', () => {
    expect(normText('Primer Apellido_1')).toBe('primerapellido1');
  });

  test('normalizeAsciiUpper strips diacritics', () => {
    expect(normalizeAsciiUpper(' España ')).toBe('ESPANA');
    expect(normalizeAsciiUpper('Cádiz')).toBe('CADIZ');
  });
});

describe('floor and door', () => {
  test('postal-code labels are not floors', () => {
    expect(sanitizeFloorToken('C.P.')).toBe('');
    expect(sanitizeFloorToken(' 3º ')).toBe('3º');
  });

  test('Cyrillic look-alike door letters become Latin', () => {
    expect(normalizeDoorToken(' в ')).toBe('B');
  });

  test('compact floor+door splits', () => {
    expect(splitCompactFloorDoor('5C', '')).toEqual(['5', 'C']);
    expect(splitCompactFloorDoor('5ºC', 'C')).toEqual(['5', 'C']);
    expect(splitCompactFloorDoor('2', 'A')).toEqual(['2', 'A']);
  });

  test('floor and door compose without repeating the door', () => {
    expect(composeFloorDoorToken('3', 'B')).toBe('3 B');
    expect(composeFloorDoorToken('3B', 'B')).toBe('3B');
    expect(composeFloorDoorToken('', 'IZQ')).toBe('IZQ');
  });
});

describe('splitAddressDetails', () => {
  test('pulls labeled tokens out of the street text', () => {
    expect(splitAddressDetails('Calle Mayor Núm. 12 Piso 3 Puerta B')).toEqual({
      street: 'Calle Mayor',
      numero: '12',
      escalera: '',
      piso: '3',
      puerta: 'B',
    });
  });

  test('staircase labels are recognized', () => {
    const details = splitAddressDetails('Avenida del Puerto Portal 2');
    expect(details.escalera).toBe('2');
    expect(details.street).toBe('Avenida del Puerto');
  });

  test('plain street stays intact', () => {
    expect(splitAddressDetails('Gran Via').street).toBe('Gran Via');
  });
});

describe('splitDateParts', () => {
  test.each([
    ['5/3/24', { day: '05', month: '03', year: '2024' }],
    ['15-07-1990', { day: '15', month: '07', year: '1990' }],
    ['1990-07-15', { day: '15', month: '07', year: '1990' }],
    ['15071990', { day: '15', month: '07', year: '1990' }],
    ['mañana', { day: '', month: '', year: '' }],
  ])('%s', (input, expected) => {
    expect(splitDateParts(input)).toEqual(expected);
  });
});

describe('splitIdentityNumber', () => {
  test('splits foreigner numbers after cleanup', () => {
    expect(splitIdentityNumber('x-1234567-l')).toEqual({ prefix: 'X', number: '1234567', suffix: 'L' });
  });

  test('national numbers do not split', () => {
    expect(splitIdentityNumber('12345678Z')).toEqual({ prefix: '', number: '', suffix: '' });
  });
});

describe('splitNameForSpanishFields', () => {
  test('comma form is honored as written', () => {
    expect(splitNameForSpanishFields('GARCIA LOPEZ, MARIA JOSE')).toEqual({
      primerApellido: 'GARCIA',
      segundoApellido: 'LOPEZ',
      nombre: 'MARIA JOSE',
    });
  });

  test('Spanish nationals get two surnames', () => {
    expect(splitNameForSpanishFields('GARCIA LOPEZ MARIA', 'ESP')).toEqual({
      primerApellido: 'GARCIA',
      segundoApellido: 'LOPEZ',
      nombre: 'MARIA',
    });
  });

  test('other nationalities get one surname', () => {
    expect(splitNameForSpanishFields('SHEVCHENKO TARAS HRYHOROVYCH', 'UKR')).toEqual({
      primerApellido: 'SHEVCHENKO',
      segundoApellido: '',
      nombre: 'TARAS HRYHOROVYCH',
    });
  });

  test('a single token is a surname', () => {
    expect(splitNameForSpanishFields('PETRENKO')).toEqual({ primerApellido: 'PETRENKO', segundoApellido: '', nombre: '' });
  });
});

describe('province and nationality', () => {
  test('province comes from the postal code prefix', () => {
    expect(inferProvinceFromPostalCode('28013')).toBe('MADRID');
    expect(inferProvinceFromPostalCode('46-001')).toBe('VALENCIA');
    expect(inferProvinceFromPostalCode('9')).toBe('');
    expect(inferProvinceFromPostalCode('99000')).toBe('');
  });

  test('alpha-3 codes map to select labels', () => {
    expect(normalizeNationalityForSelect('ukr')).toBe('UCRANIA');
    expect(normalizeNationalityForSelect('Marruecos')).toBe('Marruecos');
  });
});
