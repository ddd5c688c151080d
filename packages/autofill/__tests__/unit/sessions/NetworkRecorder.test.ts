import { describe, expect, test, vi } from 'vitest';
import type { BrowserContext, Request, Response } from 'playwright-core';
import { NetworkRecorder } from '../../../src/sessions/NetworkRecorder.js';

type Listener = (arg: unknown) => void;

function createMockContext() {
  const listeners = new Map<string, Listener>();
  return {
    on: vi.fn((event: string, listener: Listener) => {
      listeners.set(event, listener);
    }),
    off: vi.fn((event: string) => {
      listeners.delete(event);
    }),
    emit(event: string, arg: unknown) {
      listeners.get(event)?.(arg);
    },
    listeners,
  };
}

const response = (url: string, contentType: string) =>
  ({ url: () => url, headers: () => ({ 'content-type': contentType }) }) as unknown as Response;

const request = (url: string) => ({ url: () => url, method: () => 'POST' }) as unknown as Request;

describe('NetworkRecorder', () => {
  test('document responses are detected by content type or extension', () => {
    expect(NetworkRecorder.isDocumentResponse('https://x.es/a', 'Application/PDF')).toBe(true);
    expect(NetworkRecorder.isDocumentResponse('https://x.es/a.PDF', 'application/octet-stream')).toBe(true);
    expect(NetworkRecorder.isDocumentResponse('https://x.es/a', 'text/html')).toBe(false);
  });

  test('records matching traffic until detached', () => {
    const context = createMockContext();
    const recorder = new NetworkRecorder({ documentRequestPattern: /descargar/i });
    recorder.attach(context as unknown as BrowserContext);

    context.emit('response', response('https://x.es/impreso', 'application/pdf'));
    context.emit('response', response('https://x.es/app.js', 'text/javascript'));
    context.emit('request', request('https://x.es/Descargar?id=1'));
    context.emit('request', request('https://x.es/estilos.css'));
    context.emit('page', {});

    expect(recorder.documentResponses).toHaveLength(1);
    expect(recorder.documentRequests).toHaveLength(1);
    expect(recorder.popups).toHaveLength(1);

    recorder.detach();
    expect(context.listeners.size).toBe(0);

    recorder.clear();
    expect(recorder.documentResponses).toHaveLength(0);
    expect(recorder.popups).toHaveLength(0);
  });

  test('keeps only the most recent entries per list', () => {
    const context = createMockContext();
    const recorder = new NetworkRecorder({ maxEntries: 2 });
    recorder.attach(context as unknown as BrowserContext);

    for (const n of [1, 2, 3]) context.emit('response', response(`https://x.es/impreso${n}.pdf`, 'application/pdf'));

    expect(recorder.documentResponses.map((r) => r.url())).toEqual([
      'https://x.es/impreso2.pdf',
      'https://x.es/impreso3.pdf',
    ]);
  });
});
