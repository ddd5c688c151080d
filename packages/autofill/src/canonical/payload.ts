/**
 * ApplicantPayload: typed view of the nested applicant record.
 *
 * Decoded once at the boundary; scalars are coerced to trimmed strings and
 * unknown keys are dropped, so the rest of the engine only does field access.
 */

import { z } from 'zod';

const text = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .optional()
  .transform((v) => (v === undefined || v === null ? '' : String(v).trim()));

const section = <T extends z.ZodRawShape>(shape: T) => z.object(shape).optional();

export const ApplicantPayloadSchema = z.object({
  identificacion: section({
    nif_nie: text,
    pasaporte: text,
    nombre_apellidos: text,
    primer_apellido: text,
    segundo_apellido: text,
    nombre: text,
  }),
  domicilio: section({
    tipo_via: text,
    nombre_via: text,
    numero: text,
    escalera: text,
    piso: text,
    puerta: text,
    telefono: text,
    municipio: text,
    provincia: text,
    cp: text,
  }),
  declarante: section({
    localidad: text,
    fecha: text,
  }),
  autoliquidacion: section({
    tipo: text,
    num_justificante: text,
    importe_euros: text,
    importe: text,
    importe_complementaria: text,
  }),
  tramite: section({
    grupo: text,
    opcion: text,
    cantidad: text,
    dias: text,
  }),
  ingreso: section({
    forma_pago: text,
    iban: text,
  }),
  extra: section({
    sexo: text,
    nacionalidad: text,
    fecha_nacimiento: text,
    pais_nacimiento: text,
    estado_civil: text,
    lugar_nacimiento: text,
    nombre_padre: text,
    nombre_madre: text,
    representante_legal: text,
    representante_documento: text,
    titulo_representante: text,
    hijos_escolarizacion_espana: text,
    email: text,
  }),
  download: section({
    filename_prefix: text,
  }),
});

export type ApplicantPayload = z.infer<typeof ApplicantPayloadSchema>;

/** Parse an untyped record into an ApplicantPayload. Throws ZodError on shape mismatch. */
export function parseApplicantPayload(raw: unknown): ApplicantPayload {
  return ApplicantPayloadSchema.parse(raw ?? {});
}
