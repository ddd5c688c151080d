/**
 * ArtifactWriter: writes screenshots, DOM snapshots and documents into a run's
 * output directory under timestamped, slugged names.
 */

import { mkdir, writeFile } from 'fs/promises';
import { extname, join } from 'path';
import type { Page } from 'playwright-core';
import type { ApplicantPayload } from '../canonical/payload.js';

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `YYYYMMDD_HHMMSS` in local time. */
export function timestamp(now = new Date()): string {
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

/** `${prefix}_${nif}_${yyyymmdd}${ext}` for a saved document. */
export function downloadFilename(payload: ApplicantPayload, suggestedName = '', now = new Date()): string {
  const prefix = payload.download?.filename_prefix || 'document';
  const nif = payload.identificacion?.nif_nie || 'unknown';
  const day = timestamp(now).slice(0, 8);
  const ext = extname(suggestedName || 'document.pdf') || '.pdf';
  return `${prefix}_${nif}_${day}${ext}`;
}

export class ArtifactWriter {
  constructor(
    readonly outDir: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** `${timestamp}_${slug(label)}${ext}` */
  fileNameFor(label: string, ext: string): string {
    return `${timestamp(this.clock())}_${slugify(label)}${ext}`;
  }

  pathFor(label: string, ext: string): string {
    return join(this.outDir, this.fileNameFor(label, ext));
  }

  /** Create the output directory and return the path for `fileName` in it. */
  async prepare(fileName: string): Promise<string> {
    await mkdir(this.outDir, { recursive: true });
    return join(this.outDir, fileName);
  }

  async saveScreenshot(page: Page, label: string): Promise<string> {
    await mkdir(this.outDir, { recursive: true });
    const path = this.pathFor(label, '.png');
    await page.screenshot({ path, fullPage: true });
    return path;
  }

  async saveHtmlSnapshot(page: Page, label: string): Promise<string> {
    const html = await page.content();
    return this.writeText(this.pathFor(label, '.html'), html);
  }

  async writeText(path: string, text: string): Promise<string> {
    await mkdir(this.outDir, { recursive: true });
    await writeFile(path, text, 'utf-8');
    return path;
  }

  async writeBytes(fileName: string, bytes: Uint8Array): Promise<string> {
    const path = await this.prepare(fileName);
    await writeFile(path, bytes);
    return path;
  }
}
