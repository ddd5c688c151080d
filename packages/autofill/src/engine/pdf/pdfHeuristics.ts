/**
 * Name-based guesses for PDF widgets that carry no explicit mapping.
 *
 * Field names are compared after `normText` (lower-case alphanumerics), so
 * `Primer Apellido` and `primer_apellido` both read `primerapellido`.
 */

import { normText, stripExtraSpaces } from '../../canonical/normalizers.js';
import type { CanonicalFieldMap } from '../../canonical/vocabulary.js';

type Rule = [matches: (n: string) => boolean, value: (v: CanonicalFieldMap) => string];

const has = (...needles: string[]) => (n: string) => needles.some((x) => n.includes(x));

export function fullNameForTitular(values: CanonicalFieldMap): string {
  return stripExtraSpaces(
    [values.nombre, values.primer_apellido, values.segundo_apellido].filter(Boolean).join(' '),
  );
}

// First match wins; order encodes precedence between overlapping names.
const TEXT_RULES: Rule[] = [
  [has('nombreyapellidosdeltitular'), fullNameForTitular],
  [(n) => n.includes('piso') && n.includes('puert'), (v) => v.piso_puerta || v.piso || v.puerta],
  [has('pasaporte', 'passport'), (v) => v.pasaporte || v.nif_nie],
  [has('nif', 'nie', 'document'), (v) => v.nif_nie],
  [has('primerapellido', 'apellido1'), (v) => v.primer_apellido],
  [has('segundoapellido', 'apellido2'), (v) => v.segundo_apellido],
  [(n) => n === 'nombre', (v) => v.nombre],
  [has('email', 'correo'), (v) => v.email],
  [has('telefono', 'phone', 'movil'), (v) => v.telefono],
  [has('apellidosynombre', 'nombreyapellidos', 'fullname'), (v) => v.nombre_apellidos],
  [has('apellidos', 'surname', 'forename'), (v) => v.nombre_apellidos],
  [(n) => n.includes('codigopostal') || n === 'cp', (v) => v.cp],
  [has('municipio', 'city'), (v) => v.municipio],
  [has('provincia', 'province'), (v) => v.provincia],
  [has('tipovia'), (v) => v.tipo_via],
  [(n) => n.includes('domicilioenespana') || n === 'domicilio', (v) => v.domicilio_en_espana],
  [has('nombrevia', 'direccion', 'calle'), (v) => v.nombre_via],
  [(n) => n === 'num' || n.includes('numero'), (v) => v.numero],
  [(n) => n.includes('fecha') && !n.includes('nacimiento'), (v) => v.fecha],
  [has('fechanacimiento', 'birth'), (v) => v.fecha_nacimiento],
  [has('importe'), (v) => v.importe_euros],
  [has('iban'), (v) => v.iban],
  [has('nacionalidad', 'nationality'), (v) => v.nacionalidad],
  [has('estadocivil'), (v) => v.estado_civil],
  [(n) => n.includes('lugar') && n.includes('nac'), (v) => v.lugar_nacimiento],
  [(n) => n === 'pais' || n.includes('country'), (v) => v.pais_nacimiento],
  [has('padre'), (v) => v.nombre_padre],
  [has('madre'), (v) => v.nombre_madre],
  [(n) => n.includes('representante') && !has('dni', 'nie', 'pas')(n), (v) => v.representante_legal],
  [
    (n) => n.includes('dniniepas') || (n.includes('representante') && has('dni', 'nie', 'pas')(n)),
    (v) => v.representante_documento,
  ],
  [has('titulo'), (v) => v.titulo_representante],
];

/** Best-effort value for a text widget from its field name, or `''`. */
export function pdfValueForField(fieldName: string, values: CanonicalFieldMap): string {
  const n = normText(fieldName);
  if (!n) return '';
  const rule = TEXT_RULES.find(([matches]) => matches(n));
  return rule ? rule[1](values) : '';
}

// ── Check widgets ────────────────────────────────────────────────────────

const ESTADO_BOX_NAMES = new Set(['C', 'V', 'D', 'SP', 'CHKBOX-0']);

function sexoByName(n: string, sexo: string): boolean {
  return (n.includes('x') && sexo === 'X') || (n.includes('h') && sexo === 'H') || (n.includes('m') && sexo === 'M');
}

function estadoByName(n: string, estado: string): boolean {
  return (
    (n.includes('sp') && estado === 'SP') ||
    (n.includes('s') && estado === 'S') ||
    (n.includes('c') && estado === 'C') ||
    (n.includes('v') && estado === 'V') ||
    (n.includes('d') && estado === 'D')
  );
}

function hijosByName(n: string, hijos: string): boolean {
  return ((n.includes('si') || n.endsWith('s')) && hijos === 'SI') || (n.includes('no') && hijos === 'NO');
}

/** `CHKBOX-0` is the single-status box on forms that name the rest by code. */
function estadoBoxTarget(nameUpper: string): string {
  return nameUpper === 'CHKBOX-0' ? 'S' : nameUpper;
}

/**
 * Expected checked state of a checkbox from its name and the key it is mapped
 * to. `null` means the widget is not recognised and should be left alone.
 * With `byName` off only the mapped key is consulted.
 */
export function inferPdfCheckboxExpected(
  fieldName: string,
  mappedKey: string,
  values: CanonicalFieldMap,
  byName = true,
): boolean | null {
  const n = normText(fieldName);
  const sexo = values.sexo.trim().toUpperCase();
  const estado = values.estado_civil.trim().toUpperCase();
  const hijos = values.hijos_escolarizacion_espana.trim().toUpperCase();
  const nameUpper = fieldName.trim().toUpperCase();
  const key = mappedKey.trim().toLowerCase();

  switch (key) {
    case 'sexo':
      if (nameUpper === 'M') return sexo === 'M';
      if (nameUpper === 'CHKBOX') return sexo === 'H' || sexo === 'X';
      return sexoByName(n, sexo);
    case 'estado_civil':
      if (ESTADO_BOX_NAMES.has(nameUpper)) return estado === estadoBoxTarget(nameUpper);
      return estadoByName(n, estado);
    case 'hijos_escolarizacion_espana':
      if (nameUpper === 'NO') return hijos === 'NO';
      if (nameUpper.includes('HIJAS') || nameUpper.includes('HIJOS')) return hijos === 'SI';
      return hijosByName(n, hijos);
  }
  if (!byName) return null;

  if (nameUpper === 'M') return sexo === 'M';
  if (nameUpper === 'CHKBOX') return sexo === 'H' || sexo === 'X';
  if (ESTADO_BOX_NAMES.has(nameUpper)) return estado === estadoBoxTarget(nameUpper);
  if (nameUpper === 'NO') return hijos === 'NO';
  if (nameUpper.includes('HIJAS') || nameUpper.includes('HIJOS')) return hijos === 'SI';
  if (n.includes('sexo')) return sexoByName(n, sexo);
  if (n.includes('estadocivil')) return estadoByName(n, estado);
  if (n.includes('hijos') || n.includes('escolarizacion')) return hijosByName(n, hijos);
  return null;
}
