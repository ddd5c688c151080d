import { describe, expect, test, beforeEach, vi } from 'vitest';
import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Browser } from 'playwright-core';
import { parseApplicantPayload } from '../../../src/canonical/payload.js';
import { DownloadUnavailableError, InvalidTargetError, NavigationError, NotFoundError } from '../../../src/errors.js';
import { BrowserPool } from '../../../src/sessions/BrowserPool.js';
import { SessionRegistry } from '../../../src/sessions/SessionRegistry.js';
import { buildFormPdf } from '../engine/pdf/pdfFixtures.js';

const FORM_URL = 'https://sede.example.es/tramite';
const PDF_URL = 'https://sede.example.es/modelo790.pdf';
const FEE_FORM_URL = 'https://sede.policia.gob.es/Tasa790_012/ImpresoRellenar';
const HEADED = { headless: false, slowmo: 80 };

// ── Mock browser stack ────────────────────────────────────────────────────

function createMockPage() {
  let currentUrl = 'about:blank';
  let closed = false;
  return {
    setDefaultTimeout: vi.fn(),
    on: vi.fn(),
    goto: vi.fn(async (url: string) => {
      currentUrl = url;
      return null;
    }),
    url: vi.fn(() => currentUrl),
    isClosed: vi.fn(() => closed),
    title: vi.fn(async () => 'Tasa 790'),
    evaluate: vi.fn(async (): Promise<unknown> => undefined),
    content: vi.fn(async () => '<html></html>'),
    screenshot: vi.fn(async () => Buffer.from('')),
    keyboard: { press: vi.fn(async () => undefined) },
    locator: vi.fn(),
    getByLabel: vi.fn(() => ({ first: () => ({ count: async () => 0 }) })),
    close: () => {
      closed = true;
    },
  };
}

function createMockBrowser(page: ReturnType<typeof createMockPage>) {
  const context = {
    newPage: vi.fn(async () => page),
    on: vi.fn(),
    off: vi.fn(),
    close: vi.fn(async () => {}),
  };
  const browser = {
    newContext: vi.fn(async () => context),
    close: vi.fn(async () => {}),
  };
  return { browser, context };
}

function createMockFetch(pdf: Uint8Array) {
  return vi.fn(async (input: string, _init?: RequestInit) =>
    input.endsWith('.pdf')
      ? new Response(pdf, { headers: { 'content-type': 'application/pdf' } })
      : new Response('<html></html>', { headers: { 'content-type': 'text/html' } }),
  );
}

// ── Tests ─────────────────────────────────────────────────────────────────

describe('SessionRegistry', () => {
  let page: ReturnType<typeof createMockPage>;
  let stack: ReturnType<typeof createMockBrowser>;
  let pool: BrowserPool;
  let registry: SessionRegistry;
  let outDir: string;

  beforeEach(async () => {
    page = createMockPage();
    stack = createMockBrowser(page);
    pool = new BrowserPool(async () => stack.browser as unknown as Browser);
    const pdf = await buildFormPdf([{ kind: 'text', name: 'Primer Apellido', x: 50, y: 700 }]);
    let nextId = 0;
    registry = new SessionRegistry({ pool, fetch: createMockFetch(pdf), newId: () => `sess-${++nextId}` });
    outDir = await mkdtemp(join(tmpdir(), 'formpilot-sessions-'));
  });

  test('opens a headed session and reports its state', async () => {
    const opened = await registry.open(FORM_URL);

    expect(opened).toEqual({ session_id: 'sess-1', target_url: FORM_URL, current_url: FORM_URL, alive: true });
    expect(pool.refCount(HEADED)).toBe(1);
    expect(page.setDefaultTimeout).toHaveBeenCalledWith(25_000);
    expect(stack.context.on).toHaveBeenCalledWith('dialog', expect.any(Function));

    expect(await registry.getState('sess-1')).toEqual({
      session_id: 'sess-1',
      alive: true,
      current_url: FORM_URL,
      title: 'Tasa 790',
    });
  });

  test('blank targets are rejected', async () => {
    await expect(registry.open('   ')).rejects.toBeInstanceOf(InvalidTargetError);
    expect(pool.size).toBe(0);
  });

  test('a failed navigation releases the browser', async () => {
    page.goto.mockRejectedValue(new Error('net::ERR_CONNECTION_REFUSED'));

    await expect(registry.open(FORM_URL)).rejects.toBeInstanceOf(NavigationError);
    expect(stack.context.close).toHaveBeenCalledTimes(1);
    expect(stack.browser.close).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(0);
  });

  test('close is idempotent and forgets the session', async () => {
    await registry.open(FORM_URL);

    await registry.close('sess-1');
    await registry.close('sess-1');

    expect(stack.context.close).toHaveBeenCalledTimes(1);
    expect(stack.browser.close).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(0);
    await expect(registry.getState('sess-1')).rejects.toBeInstanceOf(NotFoundError);
  });

  test('a closed page reports dead', async () => {
    await registry.open(FORM_URL);
    page.close();

    expect(await registry.getState('sess-1')).toEqual({
      session_id: 'sess-1',
      alive: false,
      current_url: '',
      title: '',
    });
    await expect(registry.fill('sess-1', parseApplicantPayload({}), outDir)).rejects.toThrow(
      'Browser session page is closed.',
    );
  });

  test('fills an interactive page in strict mode', async () => {
    await registry.open(FORM_URL);

    const result = await registry.fill('sess-1', parseApplicantPayload({}), outDir);

    expect(result.mode).toBe('html');
    expect(result.session_id).toBe('sess-1');
    expect(result.current_url).toBe(FORM_URL);
    expect(result.attempted_adapters).toEqual([]);
  });

  test('a fill never serves a document captured before it started', async () => {
    await registry.open(FORM_URL);
    const onResponse = stack.context.on.mock.calls.find(([event]) => event === 'response')?.[1];
    expect(onResponse).toBeTypeOf('function');
    onResponse({
      url: () => 'https://sede.example.es/descarga/impreso.pdf',
      headers: () => ({ 'content-type': 'application/pdf' }),
      body: async () => Buffer.from('%PDF-1.4 earlier applicant'),
    });

    const err = await registry
      .fill('sess-1', parseApplicantPayload({ identificacion: { nif_nie: 'Y2222222B' } }), outDir, { download: {} })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DownloadUnavailableError);
    if (err instanceof DownloadUnavailableError) {
      expect(err.diagnostics.attempts).toContainEqual({
        strategy: 'network_response',
        reason: 'no document-like responses recorded',
      });
    }
  });

  test('fills a document target offline', async () => {
    await registry.open(PDF_URL);

    const result = await registry.fill(
      'sess-1',
      parseApplicantPayload({ identificacion: { primer_apellido: 'PETRENKO' } }),
      outDir,
      { fillStrategy: 'heuristic_fallback' },
    );

    expect(result.mode).toBe('pdf');
    expect(result.filled_fields).toEqual(['Primer Apellido']);
    expect(result.current_url).toBe(PDF_URL);
  });

  test('inspects document fields with suggestions', async () => {
    await registry.open(PDF_URL);

    const inspection = await registry.inspectFields('sess-1', parseApplicantPayload({}));

    expect(inspection.current_url).toBe(PDF_URL);
    expect(inspection.fields.map((f) => f.selector)).toEqual(['pdf:Primer Apellido']);
    expect(inspection.suggestions[0]).toMatchObject({ canonical_key: 'primer_apellido', source: 'heuristic' });
    expect(inspection.placeholder_mappings).toEqual([]);
  });

  test('teardown closes every session and browser', async () => {
    await registry.open(FORM_URL);
    await registry.open(PDF_URL);

    await registry.teardown();

    expect(registry.size).toBe(0);
    expect(pool.size).toBe(0);
    expect(stack.context.close).toHaveBeenCalledTimes(2);
    await expect(registry.open(FORM_URL)).rejects.toThrow('DriverWorker is stopped.');
  });

  test('state stays readable while a fill holds the session', async () => {
    await registry.open(FORM_URL);
    let release = () => {};
    page.evaluate.mockImplementationOnce(
      () =>
        new Promise<undefined>((resolve) => {
          release = () => resolve(undefined);
        }),
    );

    const filling = registry.fill('sess-1', parseApplicantPayload({}), outDir);
    await vi.waitFor(() => expect(page.evaluate).toHaveBeenCalled());

    expect(await registry.getState('sess-1')).toEqual({
      session_id: 'sess-1',
      alive: true,
      current_url: FORM_URL,
      title: '',
    });
    expect(page.title).not.toHaveBeenCalled();

    release();
    expect((await filling).mode).toBe('html');
  });

  test('a fee form with missing mandatory values is not downloaded', async () => {
    await registry.open(FEE_FORM_URL);
    page.locator.mockReturnValue({ count: async () => 0 });

    const err = await registry
      .fill('sess-1', parseApplicantPayload({}), outDir, { download: {} })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DownloadUnavailableError);
    if (err instanceof DownloadUnavailableError) {
      expect(err.message).toBe(
        'Form still has missing mandatory values before download:\n' +
          '- No radio selected for trámite/sections.\n' +
          '- Forma de pago is not selected.',
      );
      expect(err.diagnostics.attempts).toEqual([]);
      expect(err.diagnostics.screenshotPath?.endsWith('_before_download_validation_error.png')).toBe(true);
    }
  });

  test('lists the trámite catalog of the open page', async () => {
    await registry.open(FEE_FORM_URL);
    page.evaluate.mockResolvedValueOnce([{ group: ' Certificados ', options: ['Residencia'] }]);

    expect(await registry.tramiteCatalog('sess-1')).toEqual([{ group: 'Certificados', options: ['Residencia'] }]);
  });
});
