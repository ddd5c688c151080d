import { readRecord } from '../data/load.js';

// ── Text ─────────────────────────────────────────────────────────────────

/** Collapse whitespace and trim the ` ,.-` noise OCR leaves around tokens. */
export function stripExtraSpaces(value: string): string {
  return trimChars((value ?? '').replace(/\s+/g, ' '), ' ,.-');
}

function trimChars(value: string, chars: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && chars.includes(value[start] ?? '')) start++;
  while (end > start && chars.includes(value[end - 1] ?? '')) end--;
  return value.slice(start, end);
}

/** Lower-cased alphanumerics only. Used for fuzzy name comparisons. */
export function normText(value: string): string {
  return (value ?? '').toLowerCase().replace(/[^a-z0-9]+/g, '');
}

export const normalizeSignal = normText;

/** Upper-case and strip diacritics, so `España` and `ESPANA` compare equal. */
export function normalizeAsciiUpper(value: string): string {
  return (value ?? '').trim().toUpperCase().normalize('NFD').replace(/\p{Mn}/gu, '');
}

// ── Floor / door ─────────────────────────────────────────────────────────

const POSTAL_CODE_LABELS = new Set(['CP', 'C.P', 'C.P.', 'CODIGO POSTAL', 'CÓDIGO POSTAL']);

export function sanitizeFloorToken(value: string): string {
  const cleaned = stripExtraSpaces(value);
  if (POSTAL_CODE_LABELS.has(cleaned.toUpperCase())) return '';
  return cleaned;
}

const CYRILLIC_LOOKALIKES: Record<string, string> = {
  А: 'A',
  В: 'B',
  Е: 'E',
  К: 'K',
  М: 'M',
  Н: 'H',
  О: 'O',
  Р: 'P',
  С: 'C',
  Т: 'T',
  Х: 'X',
};

export function normalizeDoorToken(value: string): string {
  const raw = stripExtraSpaces(value).toUpperCase();
  return Array.from(raw, (ch) => CYRILLIC_LOOKALIKES[ch] ?? ch).join('');
}

/** `5C` + `` → [`5`, `C`]; `5ºC` + `C` → [`5`, `C`]. */
export function splitCompactFloorDoor(piso: string, puerta: string): [string, string] {
  const floor = sanitizeFloorToken(piso);
  const door = normalizeDoorToken(puerta);
  if (floor && door) {
    const m = /^(\d{1,3})\s*[ºª]?\s*([A-Z])$/.exec(floor.toUpperCase());
    if (m && m[2] === door) return [m[1] ?? floor, door];
  }
  if (floor && !door) {
    const m = /^(\d{1,3})\s*([A-Z])$/.exec(floor.toUpperCase());
    if (m) return [m[1] ?? floor, m[2] ?? ''];
  }
  return [floor, door];
}

/** Joins floor and door unless the door already appears in the floor token. */
export function composeFloorDoorToken(piso: string, puerta: string): string {
  const floor = sanitizeFloorToken(piso);
  const door = stripExtraSpaces(puerta);
  if (floor && door) {
    const doorNorm = normText(door);
    if (doorNorm && normText(floor).includes(doorNorm)) return floor;
    return `${floor} ${door}`.trim();
  }
  return floor || door;
}

// ── Street line ──────────────────────────────────────────────────────────

export interface AddressDetails {
  street: string;
  numero: string;
  escalera: string;
  piso: string;
  puerta: string;
}

type AddressPart = Exclude<keyof AddressDetails, 'street'>;

const ADDRESS_PATTERNS: Array<[AddressPart, RegExp]> = [
  ['numero', /\b(?:n[úu]m(?:ero)?\.?|num\.?)\s*([0-9A-Z][0-9A-Z-]*)\b/i],
  ['escalera', /\b(?:escalera|esc\.?|portal|bloque)\s*([0-9A-Z][0-9A-Z-]*)\b/i],
  ['piso', /\b(?:piso|planta)\s*([0-9A-Zºª][0-9A-Zºª-]*)(?![\wºª])/i],
  ['puerta', /\b(?:puerta|pta\.?|casa)\s*([0-9A-Z][0-9A-Z-]*)\b/i],
];

/**
 * Pull labeled number/staircase/floor/door tokens out of a free-form street
 * value. Each matched span is removed from the street text.
 */
export function splitAddressDetails(nombreVia: string): AddressDetails {
  const out: AddressDetails = { street: '', numero: '', escalera: '', piso: '', puerta: '' };
  const raw = stripExtraSpaces(nombreVia);
  if (!raw) return out;

  let work = ` ${raw} `;
  for (const [part, pattern] of ADDRESS_PATTERNS) {
    const m = pattern.exec(work);
    if (!m) continue;
    out[part] = (m[1] ?? '').trim().toUpperCase();
    work = `${work.slice(0, m.index)} ${work.slice(m.index + m[0].length)}`;
  }
  out.street = stripExtraSpaces(work);
  return out;
}

// ── Dates ────────────────────────────────────────────────────────────────

export interface DateParts {
  day: string;
  month: string;
  year: string;
}

const EMPTY_DATE: DateParts = { day: '', month: '', year: '' };

/** Accepts `dd/mm/yyyy`, `dd-mm-yy`, ISO `yyyy-mm-dd` and bare `ddmmyyyy`. */
export function splitDateParts(value: string): DateParts {
  const raw = (value ?? '').trim();
  if (!raw) return EMPTY_DATE;

  const dmy = /^(\d{1,2})[/-](\d{1,2})[/-](\d{2,4})$/.exec(raw);
  if (dmy) {
    const year = dmy[3] ?? '';
    return {
      day: (dmy[1] ?? '').padStart(2, '0'),
      month: (dmy[2] ?? '').padStart(2, '0'),
      year: year.length === 2 ? `20${year}` : year,
    };
  }

  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(raw);
  if (iso) {
    return {
      day: (iso[3] ?? '').padStart(2, '0'),
      month: (iso[2] ?? '').padStart(2, '0'),
      year: iso[1] ?? '',
    };
  }

  const digits = raw.replace(/\D+/g, '');
  if (digits.length === 8) {
    return { day: digits.slice(0, 2), month: digits.slice(2, 4), year: digits.slice(4, 8) };
  }
  return EMPTY_DATE;
}

// ── Identity ─────────────────────────────────────────────────────────────

export interface IdentityParts {
  prefix: string;
  number: string;
  suffix: string;
}

/** Splits a foreigner identity number (`X1234567L`) into its three parts. */
export function splitIdentityNumber(value: string): IdentityParts {
  const compact = (value ?? '').toUpperCase().replace(/[^A-Z0-9]/g, '');
  const m = /^([XYZ])(\d{7})([A-Z])$/.exec(compact);
  if (!m) return { prefix: '', number: '', suffix: '' };
  return { prefix: m[1] ?? '', number: m[2] ?? '', suffix: m[3] ?? '' };
}

const SPANISH_NATIONALITIES = new Set(['ESP', 'ESPAÑA', 'ESPANA', 'SPAIN']);

export interface NameParts {
  primerApellido: string;
  segundoApellido: string;
  nombre: string;
}

/**
 * Split a full name into surname1 / surname2 / given name.
 *
 * `SURNAMES, GIVEN` is honored as written. Otherwise Spanish nationals get
 * two leading surnames and everyone else one.
 */
export function splitNameForSpanishFields(fullName: string, nationality = ''): NameParts {
  const raw = (fullName ?? '').trim();
  if (!raw) return { primerApellido: '', segundoApellido: '', nombre: '' };

  const comma = raw.indexOf(',');
  if (comma >= 0) {
    const surnames = tokens(raw.slice(0, comma));
    return {
      primerApellido: surnames[0] ?? '',
      segundoApellido: surnames.slice(1).join(' '),
      nombre: raw.slice(comma + 1).trim(),
    };
  }

  const parts = tokens(raw);
  const first = parts[0] ?? '';
  if (parts.length === 1) return { primerApellido: first, segundoApellido: '', nombre: '' };
  if (parts.length === 2) return { primerApellido: first, segundoApellido: '', nombre: parts[1] ?? '' };

  if (SPANISH_NATIONALITIES.has(nationality.trim().toUpperCase())) {
    return { primerApellido: first, segundoApellido: parts[1] ?? '', nombre: parts.slice(2).join(' ') };
  }
  return { primerApellido: first, segundoApellido: '', nombre: parts.slice(1).join(' ') };
}

function tokens(value: string): string[] {
  return value.trim().split(/\s+/).filter(Boolean);
}

// ── Province / nationality ───────────────────────────────────────────────

const isString = (value: unknown): value is string => typeof value === 'string';

/** Province from the first two digits of a Spanish postal code, or `''`. */
export function inferProvinceFromPostalCode(cp: string): string {
  const digits = (cp ?? '').replace(/\D+/g, '');
  if (digits.length < 2) return '';
  return readRecord('provinces.json', isString)[digits.slice(0, 2)] ?? '';
}

const NATIONALITY_LABELS: Record<string, string> = {
  UKR: 'UCRANIA',
  ESP: 'ESPAÑA',
  DEU: 'ALEMANIA',
  FRA: 'FRANCIA',
  ITA: 'ITALIA',
  PRT: 'PORTUGAL',
  POL: 'POLONIA',
  ROU: 'RUMANIA',
  RUS: 'RUSIA',
};

/** ISO alpha-3 codes become the Spanish country label used in selects. */
export function normalizeNationalityForSelect(value: string): string {
  const code = (value ?? '').trim().toUpperCase();
  if (!code) return '';
  return NATIONALITY_LABELS[code] ?? value;
}
