import { z } from 'zod';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) ' +
  'AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/123.0.0.0 Safari/537.36';

/** `1/true/yes/on` are truthy, everything else falsy. */
const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((raw) => {
      if (raw === undefined || raw.trim() === '') return fallback;
      return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
    });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SECRET_KEY: z.string().min(1).optional(),
  AUTOFILL_TABLE_PREFIX: z.string().default('af_'),
  AUTOFILL_TEMPLATE_DIR: z.string().min(1).default('data/form_mappings'),
  PLAYWRIGHT_CHROMIUM_EXECUTABLE_PATH: z.string().optional(),
  AUTOFILL_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  AUTOFILL_LOCALE: z.string().min(2).default('es-ES'),
  PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  TEMPLATE_DEBUG_CAPTURE: flag(false),
  SAVE_ARTIFACT_SCREENSHOTS: flag(false),
  SAVE_ARTIFACT_SCREENSHOTS_ON_ERROR: flag(true),
  PDF_FLATTEN_WIDGETS: flag(false),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Drop the cached env so the next getEnv() re-reads process.env. Tests only. */
export function resetEnv(): void {
  _env = null;
}

// Debug artifacts are dev-only; screenshots additionally need their own flag.

export function isDebugCaptureEnabled(): boolean {
  return getEnv().TEMPLATE_DEBUG_CAPTURE;
}

export function shouldSaveScreenshots(): boolean {
  const env = getEnv();
  return env.TEMPLATE_DEBUG_CAPTURE && env.SAVE_ARTIFACT_SCREENSHOTS;
}

export function shouldSaveScreenshotsOnError(): boolean {
  const env = getEnv();
  return env.TEMPLATE_DEBUG_CAPTURE && env.SAVE_ARTIFACT_SCREENSHOTS_ON_ERROR;
}
