import type { Page } from 'playwright-core';
import { errorMessage } from '../../errors.js';
import { getLogger } from '../../monitoring/logger.js';

declare global {
  interface Window {
    // Present on pages that ship jQuery UI.
    jQuery?: (selector: string) => { datepicker(action: string): void };
  }
}

/**
 * Close a date-picker popup left open by filling `#fecha`, so it does not
 * cover the rest of the form. Each step is best-effort.
 */
export async function dismissOpenDatepicker(page: Page): Promise<void> {
  const log = getLogger();
  try {
    await page.evaluate(() => {
      const input = document.querySelector("#fecha, input[name='fecha']");
      if (input instanceof HTMLElement) {
        input.dispatchEvent(new Event('change', { bubbles: true }));
        input.dispatchEvent(new Event('blur', { bubbles: true }));
        input.blur();
      }
      const closeBtn = document.querySelector('#ui-datepicker-div .ui-datepicker-close');
      if (closeBtn instanceof HTMLElement && closeBtn.offsetParent !== null) {
        closeBtn.click();
        return;
      }
      if (typeof window.jQuery === 'function') {
        try {
          window.jQuery('#fecha').datepicker('hide');
        } catch (err) {
          console.debug('datepicker hide failed', err);
        }
      }
      document.body?.click();
    });
  } catch (err) {
    log.debug('Datepicker dismissal script failed', { error: errorMessage(err) });
  }
  try {
    await page.keyboard.press('Escape');
  } catch (err) {
    log.debug('Escape key press failed', { error: errorMessage(err) });
  }
}
