// Byte and body signatures used to tell documents from error pages.

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46]; // %PDF

export function isPdfBytes(bytes: Uint8Array): boolean {
  if (bytes.length < PDF_MAGIC.length) return false;
  return PDF_MAGIC.every((b, i) => bytes[i] === b);
}

/** An HTML body where a document was expected: `<html` or a doctype in the first 512 bytes. */
export function looksLikeHtml(bytes: Uint8Array): boolean {
  const head = Buffer.from(bytes.subarray(0, 512)).toString('latin1').toLowerCase();
  return head.includes('<html') || head.includes('<!doctype html');
}

const KNOWN_SERVER_ERRORS: Array<[marker: string, message: string]> = [
  [
    'error en captcha',
    'Server returned CAPTCHA error: invalid/expired captcha. Enter the NEW captcha shown by the page and retry.',
  ],
  ['debe introducir una forma de pago', 'Server validation error: forma de pago not selected.'],
  ['debe seleccionar uno de los trámites', 'Server validation error: trámite option not selected.'],
];

/** Message for a recognized server-side validation page, or `''`. */
export function extractKnownServerError(body: Uint8Array): string {
  const text = Buffer.from(body).toString('utf-8').toLowerCase();
  for (const [marker, message] of KNOWN_SERVER_ERRORS) {
    if (text.includes(marker)) return message;
  }
  return '';
}
