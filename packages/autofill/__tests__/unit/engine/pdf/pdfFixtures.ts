import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PDFDocument, PDFName, PDFString } from 'pdf-lib';

export type FixtureField =
  | { kind: 'text'; name: string; x: number; y: number; width?: number; value?: string; tooltip?: string }
  | { kind: 'checkbox'; name: string; x: number; y: number }
  | { kind: 'dropdown'; name: string; x: number; y: number; options: string[] };

/** One-page 600x800 form with the given widgets. */
export async function buildFormPdf(fields: FixtureField[]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const page = doc.addPage([600, 800]);
  const form = doc.getForm();
  for (const def of fields) {
    switch (def.kind) {
      case 'text': {
        const field = form.createTextField(def.name);
        if (def.value) field.setText(def.value);
        if (def.tooltip) field.acroField.dict.set(PDFName.of('TU'), PDFString.of(def.tooltip));
        field.addToPage(page, { x: def.x, y: def.y, width: def.width ?? 200, height: 20 });
        break;
      }
      case 'checkbox':
        form.createCheckBox(def.name).addToPage(page, { x: def.x, y: def.y, width: 12, height: 12 });
        break;
      case 'dropdown': {
        const field = form.createDropdown(def.name);
        field.setOptions(def.options);
        field.addToPage(page, { x: def.x, y: def.y, width: 150, height: 20 });
        break;
      }
    }
  }
  return doc.save();
}

export function tempOutDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'formpilot-pdf-'));
}
