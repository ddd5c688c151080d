import { readFileSync } from 'node:fs';

const cache = new Map<string, unknown>();

/** Parse a JSON file shipped beside this module. Cached per name. */
export function readDataFile(name: string): unknown {
  if (!cache.has(name)) {
    cache.set(name, JSON.parse(readFileSync(new URL(`./${name}`, import.meta.url), 'utf-8')));
  }
  return cache.get(name);
}

/** A JSON object whose values all pass `check`; other entries are dropped. */
export function readRecord<T>(name: string, check: (value: unknown) => value is T): Record<string, T> {
  const raw = readDataFile(name);
  const out: Record<string, T> = {};
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return out;
  for (const [key, value] of Object.entries(raw)) {
    if (check(value)) out[key] = value;
  }
  return out;
}
