import { vi } from 'vitest';
import type { Page } from 'playwright-core';

export interface FakeElement {
  type?: string;
  value?: string;
  options?: Array<{ text: string; value: string }>;
  visible?: boolean;
  disabled?: boolean;
}

/**
 * Page stand-in backed by a selector → element table. `labels` maps visible
 * label text to the control it names and `radios` lists radio names;
 * `getByLabel` and `getByRole('radio')` match against them and record writes
 * under `label:<text>` and `radio:<name>`.
 */
export function createFakePage(
  dom: Record<string, FakeElement>,
  url = 'https://sede.example.es/tramite',
  labels: Record<string, FakeElement> = {},
  radios: string[] = [],
) {
  const calls: Array<[action: string, selector: string, arg?: unknown]> = [];

  const makeLocator = (key: string, el: FakeElement | undefined) => {
    const loc = {
      count: vi.fn(async () => (el ? 1 : 0)),
      isVisible: vi.fn(async () => el?.visible ?? true),
      isDisabled: vi.fn(async () => el?.disabled ?? false),
      getAttribute: vi.fn(async (name: string) => (name === 'type' ? el?.type ?? null : null)),
      inputValue: vi.fn(async () => el?.value ?? ''),
      fill: vi.fn(async (value: string) => {
        calls.push(['fill', key, value]);
      }),
      selectOption: vi.fn(async (option: unknown) => {
        calls.push(['select', key, option]);
        return [];
      }),
      check: vi.fn(async () => {
        calls.push(['check', key]);
      }),
      uncheck: vi.fn(async () => {
        calls.push(['uncheck', key]);
      }),
      locator: vi.fn(() => ({ evaluateAll: vi.fn(async () => el?.options ?? []) })),
    };
    return { ...loc, first: () => loc };
  };

  const locator = vi.fn((selector: string) => makeLocator(selector, dom[selector]));

  const getByLabel = vi.fn((pattern: RegExp) => {
    const text = Object.keys(labels).find((label) => pattern.test(label));
    return makeLocator(`label:${text ?? pattern.source}`, text === undefined ? undefined : labels[text]);
  });

  const getByRole = vi.fn((_role: string, opts: { name: RegExp }) => {
    const name = radios.find((radio) => opts.name.test(radio));
    return makeLocator(`radio:${name ?? opts.name.source}`, name === undefined ? undefined : { type: 'radio' });
  });

  const page = {
    url: vi.fn(() => url),
    locator,
    getByLabel,
    getByRole,
    evaluate: vi.fn(async (): Promise<unknown> => undefined),
    screenshot: vi.fn(async () => Buffer.from('')),
    content: vi.fn(async () => '<html><body>fee form</body></html>'),
    keyboard: { press: vi.fn(async (_key: string) => undefined) },
  };

  return { page: page as unknown as Page, mock: page, calls };
}
