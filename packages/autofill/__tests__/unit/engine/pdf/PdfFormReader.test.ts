import { describe, expect, test } from 'vitest';
import { collectPdfFieldValues, inspectPdfFields, loadPdfForm } from '../../../../src/engine/pdf/PdfFormReader.js';
import { buildFormPdf } from './pdfFixtures.js';

describe('PdfFormReader', () => {
  test('reports kinds and top-left geometry', async () => {
    const bytes = await buildFormPdf([
      { kind: 'text', name: 'Nombre', x: 50, y: 700 },
      { kind: 'checkbox', name: 'H', x: 50, y: 600 },
      { kind: 'dropdown', name: 'Provincia', x: 300, y: 700, options: ['MADRID'] },
    ]);

    const { fields } = await loadPdfForm(bytes);

    expect(fields.map((f) => [f.name, f.kind, f.isCheck])).toEqual([
      ['Nombre', 'text', false],
      ['H', 'checkbox', true],
      ['Provincia', 'dropdown', false],
    ]);
    expect(fields[0]).toMatchObject({ pageIndex: 0, x0: 50, y0: 80, x1: 250, y1: 100, width: 200 });
    expect(fields[1]).toMatchObject({ x0: 50, y0: 188, width: 12 });
  });

  test('descriptors use pdf: selectors and the tooltip as label', async () => {
    const bytes = await buildFormPdf([{ kind: 'text', name: 'f1_email', x: 50, y: 700, tooltip: 'Correo' }]);

    const [descriptor] = await inspectPdfFields(bytes);

    expect(descriptor).toEqual({
      selector: 'pdf:f1_email',
      tag: 'pdf_widget',
      type: 'text',
      id: 'f1_email',
      name: 'f1_email',
      label: 'Correo',
      placeholder: '',
      aria_label: '',
      visible: true,
      pdf_field_name: 'f1_email',
      pdf_label_guess: 'Correo',
      page_index: 0,
      rect: { x0: 50, y0: 80, x1: 250, y1: 100 },
    });
  });

  test('collects non-empty values for placeholder detection', async () => {
    const bytes = await buildFormPdf([
      { kind: 'text', name: 'Email', x: 50, y: 700, value: ' {email} ' },
      { kind: 'text', name: 'Vacio', x: 50, y: 650 },
    ]);

    expect(await collectPdfFieldValues(bytes)).toEqual([{ selector: 'pdf:Email', value: '{email}' }]);
  });
});
