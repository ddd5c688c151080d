import type { Page } from 'playwright-core';
import { inferProvinceFromPostalCode, normalizeNationalityForSelect } from '../../../canonical/normalizers.js';
import type { CanonicalFieldKey, CanonicalFieldMap } from '../../../canonical/vocabulary.js';
import { selectIfPossible, setIfPossible } from '../fieldWriters.js';
import { type FilledFields, type HtmlFormAdapter, writeField } from './types.js';

// Fee-payment form controls, all named `Ctrl_<Field>`.
const TEXT_CONTROLS: Array<[CanonicalFieldKey, string]> = [
  ['nombre_via', 'ViaDom'],
  ['numero', 'NumeroDom'],
  ['escalera', 'EscaleraDom'],
  ['piso', 'PisoDom'],
  ['puerta', 'PuertaDom'],
  ['municipio', 'MunicipioDom'],
];

const input = (ctrl: string) => [`#Ctrl_${ctrl}`, `input[name='Ctrl_${ctrl}']`];
const select = (ctrl: string) => [`#Ctrl_${ctrl}`, `select[name='Ctrl_${ctrl}']`];

export const adminTasasAdapter: HtmlFormAdapter = {
  name: 'admin_tasas_pdf',

  matches(host, path) {
    return host.includes('sede.administracionespublicas.gob.es') && path.startsWith('/tasaspdf');
  },

  async apply(page: Page, values: CanonicalFieldMap, filled: FilledFields) {
    const fill = (ctrl: string) => (v: string) => setIfPossible(page, input(ctrl), v);
    const choose = (ctrl: string) => (v: string) => selectIfPossible(page, select(ctrl), v);

    await writeField(filled, 'nif_nie', values.nif_nie, fill('NIFRem'));
    await writeField(filled, 'primer_apellido', values.primer_apellido, fill('Apellido1'));
    await writeField(filled, 'segundo_apellido', values.segundo_apellido, fill('Apellido2'));
    await writeField(filled, 'nombre', values.nombre, fill('NombreRem'));
    await writeField(filled, 'nacionalidad', normalizeNationalityForSelect(values.nacionalidad), choose('SelNacionalidad'));
    await writeField(filled, 'tipo_via', values.tipo_via, choose('TipoViaDom'));
    for (const [key, ctrl] of TEXT_CONTROLS) {
      await writeField(filled, key, values[key], fill(ctrl));
    }

    // The province select only knows canonical names; fall back to the postal code.
    if (!filled.has('provincia')) await selectProvince(values, choose('ProvinciaDom'), filled);

    await writeField(filled, 'cp', values.cp, fill('CPostalDom'));
    await writeField(filled, 'telefono', values.telefono, fill('TelefonoDom'));
  },
};

async function selectProvince(
  values: CanonicalFieldMap,
  choose: (v: string) => Promise<boolean>,
  filled: FilledFields,
): Promise<void> {
  let selected = values.provincia ? await choose(values.provincia) : false;
  if (!selected) {
    const inferred = inferProvinceFromPostalCode(values.cp);
    if (inferred) selected = await choose(inferred);
  }
  if (selected) filled.add('provincia');
}
