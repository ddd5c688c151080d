/**
 * FileTemplateStore: the template store for machines without Supabase.
 *
 * One JSON file per target under a directory, named from the normalized host
 * and path. Same single-latest semantics as TemplateStore.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import { getEnv } from '../config/env.js';
import { getLogger } from '../monitoring/logger.js';
import { TemplateStore, type TemplateRepository } from './TemplateStore.js';
import { MappingTemplateSchema, type FieldDescriptor, type MappingTemplate, type RawFieldMapping } from './types.js';

const safeToken = (value: string) => value.trim().replace(/[/:]/g, '_');

/** `<host>__<path>` with separators flattened; the root path becomes `root`. */
export function targetFileKey(host: string, path: string): string {
  const pathToken = safeToken(path).replace(/^_+|_+$/g, '') || 'root';
  return `${safeToken(host)}__${pathToken}`;
}

export class FileTemplateStore implements TemplateRepository {
  private readonly log = getLogger().child({ component: 'FileTemplateStore' });

  /** Defaults to AUTOFILL_TEMPLATE_DIR. */
  constructor(private readonly dir: string = getEnv().AUTOFILL_TEMPLATE_DIR) {}

  private fileFor(host: string, path: string): string {
    return join(this.dir, `${targetFileKey(host, path)}.json`);
  }

  async getLatest(targetUrl: string): Promise<MappingTemplate | null> {
    const { host, path } = TemplateStore.normalizeUrlParts(targetUrl);
    if (!host) return null;

    let raw: string;
    try {
      raw = await readFile(this.fileFor(host, path), 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      this.log.warn('Discarding unreadable mapping template file', { host, path, error: String(err) });
      return null;
    }
    const parsed = MappingTemplateSchema.safeParse(data);
    if (!parsed.success) {
      this.log.warn('Discarding malformed mapping template file', {
        host,
        path,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return null;
    }
    return parsed.data;
  }

  async save(
    targetUrl: string,
    fieldsSnapshot: FieldDescriptor[],
    mappings: RawFieldMapping[],
    source = 'user',
  ): Promise<MappingTemplate> {
    const existing = await this.getLatest(targetUrl);
    const template = TemplateStore.buildTemplate(targetUrl, fieldsSnapshot, mappings, source, existing);

    await mkdir(this.dir, { recursive: true });
    const file = this.fileFor(template.host, template.path);
    const tmp = `${file}.tmp`;
    await writeFile(tmp, JSON.stringify(template, null, 2), 'utf-8');
    await rename(tmp, file);

    TemplateStore.logSaved(template, mappings.length);
    return template;
  }
}

/** Supabase when SUPABASE_URL and SUPABASE_SECRET_KEY are set, local files otherwise. */
export function createTemplateStore(): TemplateRepository {
  const env = getEnv();
  if (env.SUPABASE_URL && env.SUPABASE_SECRET_KEY) return new TemplateStore();
  getLogger().info('Supabase not configured, using local template files', { dir: env.AUTOFILL_TEMPLATE_DIR });
  return new FileTemplateStore(env.AUTOFILL_TEMPLATE_DIR);
}
