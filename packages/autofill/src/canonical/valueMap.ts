import type { ApplicantPayload } from './payload.js';
import type { CanonicalFieldMap } from './vocabulary.js';
import {
  composeFloorDoorToken,
  inferProvinceFromPostalCode,
  sanitizeFloorToken,
  splitAddressDetails,
  splitCompactFloorDoor,
  splitDateParts,
  splitIdentityNumber,
  splitNameForSpanishFields,
  stripExtraSpaces,
} from './normalizers.js';

/**
 * Flatten an applicant payload into the canonical field map.
 *
 * Pure and deterministic: every vocabulary key is present, missing values are
 * empty strings.
 */
export function buildCanonicalFieldMap(payload: ApplicantPayload): CanonicalFieldMap {
  const id = payload.identificacion;
  const dom = payload.domicilio;
  const extra = payload.extra;
  const decl = payload.declarante;
  const auto = payload.autoliquidacion;

  // Names
  const rawFullName = id?.nombre_apellidos ?? '';
  const nacionalidad = extra?.nacionalidad ?? '';
  const split = splitNameForSpanishFields(rawFullName, nacionalidad);
  const primerApellido = id?.primer_apellido || split.primerApellido;
  const segundoApellido = id?.segundo_apellido || split.segundoApellido;
  const nombre = id?.nombre || split.nombre;
  const nombreApellidos =
    stripExtraSpaces([primerApellido, segundoApellido, nombre].filter(Boolean).join(' ')) ||
    stripExtraSpaces(rawFullName.replace(/,/g, ' ')) ||
    rawFullName;

  // Address
  const tipoVia = dom?.tipo_via ?? '';
  const rawVia = dom?.nombre_via ?? '';
  const details = splitAddressDetails(rawVia);
  const nombreVia = details.street || rawVia;
  const [piso, puerta] = splitCompactFloorDoor(
    sanitizeFloorToken(dom?.piso ?? '') || details.piso,
    dom?.puerta || details.puerta,
  );
  const cp = dom?.cp ?? '';

  // Identity
  const nifNie = (id?.nif_nie ?? '').toUpperCase();
  const nie = splitIdentityNumber(nifNie);

  // Dates
  const fecha = decl?.fecha ?? '';
  const fechaNacimiento = extra?.fecha_nacimiento ?? '';
  const fechaParts = splitDateParts(fecha);
  const nacimientoParts = splitDateParts(fechaNacimiento);

  return {
    nif_nie: nifNie,
    nif_nie_prefix: nie.prefix,
    nif_nie_number: nie.number,
    nif_nie_suffix: nie.suffix,
    pasaporte: id?.pasaporte ?? '',
    nombre_apellidos: nombreApellidos,
    primer_apellido: primerApellido,
    segundo_apellido: segundoApellido,
    nombre,
    sexo: extra?.sexo ?? '',
    tipo_via: tipoVia,
    nombre_via: nombreVia,
    domicilio_en_espana: [tipoVia, nombreVia].filter(Boolean).join(' ').trim(),
    numero: dom?.numero || details.numero,
    escalera: dom?.escalera || details.escalera,
    piso,
    puerta,
    piso_puerta: composeFloorDoorToken(piso, puerta),
    telefono: dom?.telefono ?? '',
    municipio: dom?.municipio ?? '',
    provincia: dom?.provincia || inferProvinceFromPostalCode(cp),
    cp,
    localidad: decl?.localidad ?? '',
    fecha,
    fecha_dia: fechaParts.day,
    fecha_mes: fechaParts.month,
    fecha_anio: fechaParts.year,
    importe_euros: auto?.importe_euros || auto?.importe || auto?.importe_complementaria || '',
    forma_pago: payload.ingreso?.forma_pago ?? '',
    iban: payload.ingreso?.iban ?? '',
    email: extra?.email ?? '',
    fecha_nacimiento: fechaNacimiento,
    fecha_nacimiento_dia: nacimientoParts.day,
    fecha_nacimiento_mes: nacimientoParts.month,
    fecha_nacimiento_anio: nacimientoParts.year,
    nacionalidad,
    pais_nacimiento: extra?.pais_nacimiento ?? '',
    estado_civil: extra?.estado_civil ?? '',
    lugar_nacimiento: extra?.lugar_nacimiento ?? '',
    nombre_padre: extra?.nombre_padre ?? '',
    nombre_madre: extra?.nombre_madre ?? '',
    representante_legal: extra?.representante_legal ?? '',
    representante_documento: extra?.representante_documento ?? '',
    titulo_representante: extra?.titulo_representante ?? '',
    hijos_escolarizacion_espana: extra?.hijos_escolarizacion_espana ?? '',
  };
}
