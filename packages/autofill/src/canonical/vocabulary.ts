/**
 * Canonical field key vocabulary.
 *
 * The stable contract between the payload normalizer and the fill engine.
 * Order matters: it is also the fill/suggestion priority.
 */

export const CANONICAL_VOCABULARY_VERSION = 1;

export const CANONICAL_FIELD_KEYS = [
  'nif_nie',
  'nif_nie_prefix',
  'nif_nie_number',
  'nif_nie_suffix',
  'pasaporte',
  'nombre_apellidos',
  'primer_apellido',
  'segundo_apellido',
  'nombre',
  'sexo',
  'tipo_via',
  'nombre_via',
  'domicilio_en_espana',
  'numero',
  'escalera',
  'piso',
  'puerta',
  'piso_puerta',
  'telefono',
  'municipio',
  'provincia',
  'cp',
  'localidad',
  'fecha',
  'fecha_dia',
  'fecha_mes',
  'fecha_anio',
  'importe_euros',
  'forma_pago',
  'iban',
  'email',
  'fecha_nacimiento',
  'fecha_nacimiento_dia',
  'fecha_nacimiento_mes',
  'fecha_nacimiento_anio',
  'nacionalidad',
  'pais_nacimiento',
  'estado_civil',
  'lugar_nacimiento',
  'nombre_padre',
  'nombre_madre',
  'representante_legal',
  'representante_documento',
  'titulo_representante',
  'hijos_escolarizacion_espana',
] as const;

export type CanonicalFieldKey = (typeof CANONICAL_FIELD_KEYS)[number];

export type CanonicalFieldMap = Record<CanonicalFieldKey, string>;

const KEY_SET: ReadonlySet<string> = new Set(CANONICAL_FIELD_KEYS);

export function isCanonicalFieldKey(value: string): value is CanonicalFieldKey {
  return KEY_SET.has(value);
}

const PRIORITY = new Map<string, number>(CANONICAL_FIELD_KEYS.map((key, idx) => [key, idx]));

/** Vocabulary position of a key; unknown keys sort last. */
export function canonicalPriority(key: string): number {
  return PRIORITY.get(key) ?? 999;
}
