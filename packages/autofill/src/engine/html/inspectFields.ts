import type { Page } from 'playwright-core';
import type { PlaceholderValue } from '../../mapping/placeholders.js';
import type { FieldDescriptor } from '../../mapping/types.js';

/**
 * Describe every fillable control on the page. Hidden, button-like and
 * disabled inputs are skipped, as are controls with neither id nor name.
 */
export async function inspectHtmlFields(page: Page): Promise<FieldDescriptor[]> {
  return page.evaluate(() => {
    const SKIP_TYPES = ['hidden', 'submit', 'button', 'reset'];
    const rows: FieldDescriptor[] = [];
    const elements = Array.from(document.querySelectorAll('input, select, textarea'));
    for (const el of elements) {
      if (
        !(el instanceof HTMLInputElement || el instanceof HTMLSelectElement || el instanceof HTMLTextAreaElement)
      ) {
        continue;
      }
      const type = (el.getAttribute('type') ?? '').toLowerCase();
      if (SKIP_TYPES.includes(type) || el.disabled) continue;

      let selector = '';
      if (el.id) selector = `#${CSS.escape(el.id)}`;
      else if (el.name) selector = `${el.tagName.toLowerCase()}[name="${el.name.replace(/"/g, '\\"')}"]`;
      else continue;

      let label = '';
      if (el.id) {
        const byFor = document.querySelector(`label[for="${CSS.escape(el.id)}"]`);
        if (byFor) label = (byFor.textContent ?? '').trim();
      }
      if (!label) {
        const wrapped = el.closest('label');
        if (wrapped) label = (wrapped.textContent ?? '').trim();
      }

      rows.push({
        selector,
        tag: el.tagName.toLowerCase(),
        type,
        id: el.id,
        name: el.getAttribute('name') ?? '',
        label,
        placeholder: el.getAttribute('placeholder') ?? '',
        aria_label: el.getAttribute('aria-label') ?? '',
        visible: Boolean(el.offsetWidth || el.offsetHeight || el.getClientRects().length),
      });
    }
    return rows;
  });
}

/** Non-empty current values of fillable controls, for `{key}` placeholder detection. */
export async function collectHtmlFieldValues(page: Page): Promise<PlaceholderValue[]> {
  return page.evaluate(() => {
    const SKIP_TYPES = ['hidden', 'submit', 'button', 'reset'];
    const out: Array<{ selector: string; value: string }> = [];
    for (const el of Array.from(document.querySelectorAll('input, select, textarea'))) {
      if (
        !(el instanceof HTMLInputElement || el instanceof HTMLSelectElement || el instanceof HTMLTextAreaElement)
      ) {
        continue;
      }
      const type = (el.getAttribute('type') ?? '').toLowerCase();
      if (SKIP_TYPES.includes(type) || el.disabled) continue;
      let selector = '';
      if (el.id) selector = `#${CSS.escape(el.id)}`;
      else if (el.name) selector = `${el.tagName.toLowerCase()}[name="${el.name.replace(/"/g, '\\"')}"]`;
      else continue;
      const value = (el.value ?? '').trim();
      if (value) out.push({ selector, value });
    }
    return out;
  });
}
