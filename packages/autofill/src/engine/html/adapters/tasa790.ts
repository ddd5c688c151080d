import type { Page } from 'playwright-core';
import type { ApplicantPayload } from '../../../canonical/payload.js';
import type { CanonicalFieldMap } from '../../../canonical/vocabulary.js';
import { fillTasa790MainSections } from '../tasa790Steps.js';
import type { FilledFields, HtmlFormAdapter } from './types.js';

/** Police fee form 790-012: every section, the trámite included when the payload names one. */
export const tasa790Adapter: HtmlFormAdapter = {
  name: 'tasa_790_012',

  matches(host, path) {
    return host.includes('sede.policia.gob.es') && path.startsWith('/tasa790_012');
  },

  async apply(page: Page, values: CanonicalFieldMap, filled: FilledFields, payload: ApplicantPayload) {
    await fillTasa790MainSections(page, values, payload, filled, { selectTramite: true });
  },
};
