import type { Page } from 'playwright-core';
import { normalizeNationalityForSelect } from '../../../canonical/normalizers.js';
import type { CanonicalFieldKey, CanonicalFieldMap } from '../../../canonical/vocabulary.js';
import { fillByLabel, selectIfPossible, setIfPossible } from '../fieldWriters.js';
import { type FilledFields, type HtmlFormAdapter, writeField } from './types.js';

const LABELS: Partial<Record<CanonicalFieldKey, RegExp[]>> = {
  nif_nie: [/NIF\s*\/\s*NIE/i, /NIE/i, /NIF/i],
  primer_apellido: [/Primer apellido/i, /Raz[oó]n Social/i],
  segundo_apellido: [/Segundo apellido/i],
  nombre: [/^Nombre/i],
  nacionalidad: [/Nacionalidad/i],
  tipo_via: [/Tipo\s+de\s+v[ií]a/i, /Calle\/plaza\/Avda/i],
  nombre_via: [/Nombre de la v[ií]a p[uú]blica/i, /v[ií]a p[uú]blica/i],
  numero: [/Num/i, /N[uú]m/i],
  escalera: [/Esc/i],
  piso: [/Piso/i],
  puerta: [/Pta/i],
  municipio: [/Municipio/i],
  localidad: [/Localidad/i],
  provincia: [/Provincia/i],
  cp: [/C\.?\s*Postal/i, /C[oó]digo postal/i, /CP/i],
  telefono: [/Tel[eé]fono/i, /Phone/i],
};

// Keys tried by selector first, then by label.
const SELECTOR_FIRST: Array<[CanonicalFieldKey, string[], RegExp[]]> = [
  [
    'email',
    ['#email', "input[type='email']", "input[name*='mail' i]", "input[name*='email' i]"],
    [/mail/i, /email/i, /correo/i],
  ],
  ['fecha', ['#fecha', "input[name*='fecha' i]", "input[type='date']"], [/fecha/i]],
  [
    'nombre_apellidos',
    ['#full_name', "input[name*='full_name' i]", "input[name*='nombre_apellidos' i]"],
    [/nombre\s*y\s*apellidos/i, /apellidos\s*y\s*nombre/i, /full\s*name/i],
  ],
];

const byLabel = (page: Page, key: CanonicalFieldKey) => (v: string) => fillByLabel(page, LABELS[key] ?? [], v);

/** Label-driven fallback for any interactive form. */
export const genericHtmlAdapter: HtmlFormAdapter = {
  name: 'generic_html',

  matches() {
    return true;
  },

  async apply(page: Page, values: CanonicalFieldMap, filled: FilledFields) {
    await writeField(filled, 'nif_nie', values.nif_nie, byLabel(page, 'nif_nie'));
    await writeField(filled, 'primer_apellido', values.primer_apellido, byLabel(page, 'primer_apellido'));
    await writeField(filled, 'segundo_apellido', values.segundo_apellido, byLabel(page, 'segundo_apellido'));
    await writeField(filled, 'nombre', values.nombre, byLabel(page, 'nombre'));

    await writeField(filled, 'nacionalidad', normalizeNationalityForSelect(values.nacionalidad), async (v) =>
      (await selectIfPossible(page, ["select[name*='nacionalidad' i]", "select[id*='nacionalidad' i]"], v)) ||
      byLabel(page, 'nacionalidad')(v),
    );

    await writeField(filled, 'tipo_via', values.tipo_via, async (v) =>
      (await selectIfPossible(page, ["select[name*='via' i]", "select[id*='via' i]", "select[name*='calle' i]"], v)) ||
      (await setIfPossible(page, ['#calle', "input[name='calle']", "input[id='calle']"], v)) ||
      byLabel(page, 'tipo_via')(v),
    );

    for (const key of ['nombre_via', 'numero', 'escalera', 'piso', 'puerta', 'municipio'] as const) {
      await writeField(filled, key, values[key], byLabel(page, key));
    }

    await writeField(filled, 'provincia', values.provincia, async (v) =>
      (await selectIfPossible(page, ["select[name*='provincia' i]", "select[id*='provincia' i]"], v)) ||
      byLabel(page, 'provincia')(v),
    );

    await writeField(filled, 'cp', values.cp, byLabel(page, 'cp'));
    await writeField(filled, 'telefono', values.telefono, byLabel(page, 'telefono'));
    await writeField(filled, 'localidad', values.localidad, byLabel(page, 'localidad'));

    for (const [key, selectors, labels] of SELECTOR_FIRST) {
      await writeField(filled, key, values[key], async (v) =>
        (await setIfPossible(page, selectors, v)) || fillByLabel(page, labels, v),
      );
    }
  },
};
