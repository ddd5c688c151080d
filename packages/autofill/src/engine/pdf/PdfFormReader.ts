/**
 * PdfFormReader: AcroForm field discovery on top of pdf-lib.
 *
 * Geometry is reported in top-left page space (y grows downwards) from the
 * field's first widget, so row/column reasoning reads the same as on screen.
 */

import {
  PDFCheckBox,
  PDFDocument,
  PDFDropdown,
  PDFHexString,
  PDFName,
  PDFRadioGroup,
  PDFString,
  PDFTextField,
  type PDFField,
  type PDFWidgetAnnotation,
} from 'pdf-lib';
import type { PlaceholderValue } from '../../mapping/placeholders.js';
import type { FieldDescriptor } from '../../mapping/types.js';

// ── Types ────────────────────────────────────────────────────────────────

export type PdfFieldKind = 'text' | 'checkbox' | 'radio' | 'dropdown' | 'other';

export interface PdfFieldGeometry {
  name: string;
  isCheck: boolean;
  pageIndex: number;
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  width: number;
}

export interface PdfFieldInfo extends PdfFieldGeometry {
  kind: PdfFieldKind;
  /** Current text value, or the selected option for choice fields. */
  value: string;
  /** Alternate field name (tooltip) when the form defines one. */
  alternateName: string;
  field: PDFField;
}

export interface LoadedPdfForm {
  doc: PDFDocument;
  fields: PdfFieldInfo[];
}

// ── Reading ──────────────────────────────────────────────────────────────

function kindOf(field: PDFField): PdfFieldKind {
  if (field instanceof PDFTextField) return 'text';
  if (field instanceof PDFCheckBox) return 'checkbox';
  if (field instanceof PDFRadioGroup) return 'radio';
  if (field instanceof PDFDropdown) return 'dropdown';
  return 'other';
}

function currentValue(field: PDFField): string {
  if (field instanceof PDFTextField) return field.getText() ?? '';
  if (field instanceof PDFDropdown) return field.getSelected()[0] ?? '';
  if (field instanceof PDFRadioGroup) return field.getSelected() ?? '';
  return '';
}

function alternateNameOf(field: PDFField): string {
  const tu = field.acroField.dict.lookup(PDFName.of('TU'));
  if (tu instanceof PDFString || tu instanceof PDFHexString) return tu.decodeText().trim();
  return '';
}

function pageIndexOf(doc: PDFDocument, widget: PDFWidgetAnnotation): number {
  const pages = doc.getPages();
  const pageRef = widget.P();
  if (pageRef) {
    const idx = pages.findIndex((p) => p.ref === pageRef);
    if (idx >= 0) return idx;
  }
  const widgetRef = doc.context.getObjectRef(widget.dict);
  if (widgetRef) {
    const idx = pages.findIndex((p) => (p.node.Annots()?.asArray() ?? []).some((a) => a === widgetRef));
    if (idx >= 0) return idx;
  }
  return 0;
}

function geometryOf(doc: PDFDocument, field: PDFField, name: string, isCheck: boolean): PdfFieldGeometry {
  const widget = field.acroField.getWidgets()[0];
  if (!widget) return { name, isCheck, pageIndex: 0, x0: 0, y0: 0, x1: 0, y1: 0, width: 0 };
  const rect = widget.getRectangle();
  const pageIndex = pageIndexOf(doc, widget);
  const pageHeight = doc.getPages()[pageIndex]?.getHeight() ?? 0;
  const y0 = pageHeight - (rect.y + rect.height);
  return {
    name,
    isCheck,
    pageIndex,
    x0: rect.x,
    y0,
    x1: rect.x + rect.width,
    y1: y0 + rect.height,
    width: rect.width,
  };
}

export async function loadPdfForm(bytes: Uint8Array): Promise<LoadedPdfForm> {
  const doc = await PDFDocument.load(bytes, { ignoreEncryption: true });
  const fields: PdfFieldInfo[] = [];
  for (const field of doc.getForm().getFields()) {
    const name = field.getName().trim();
    if (!name) continue;
    const kind = kindOf(field);
    fields.push({
      ...geometryOf(doc, field, name, kind === 'checkbox' || kind === 'radio'),
      kind,
      value: currentValue(field),
      alternateName: alternateNameOf(field),
      field,
    });
  }
  return { doc, fields };
}

const round2 = (n: number) => Math.round(n * 100) / 100;

/** Field descriptors addressed as `pdf:<field name>`. */
export async function inspectPdfFields(bytes: Uint8Array): Promise<FieldDescriptor[]> {
  const { fields } = await loadPdfForm(bytes);
  return fields.map((f) => ({
    selector: `pdf:${f.name}`,
    tag: 'pdf_widget',
    type: f.kind,
    id: f.name,
    name: f.name,
    label: f.alternateName || f.name,
    placeholder: '',
    aria_label: '',
    visible: true,
    pdf_field_name: f.name,
    pdf_label_guess: f.alternateName,
    page_index: f.pageIndex,
    rect: { x0: round2(f.x0), y0: round2(f.y0), x1: round2(f.x1), y1: round2(f.y1) },
  }));
}

/** Non-empty current values, for `{key}` placeholder detection. */
export async function collectPdfFieldValues(bytes: Uint8Array): Promise<PlaceholderValue[]> {
  const { fields } = await loadPdfForm(bytes);
  return fields
    .filter((f) => f.value.trim() !== '')
    .map((f) => ({ selector: `pdf:${f.name}`, value: f.value.trim() }));
}
