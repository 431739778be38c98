import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_FONT_ROLES: Record<string, 'label' | 'value'> = {
  'Helvetica-Bold': 'label',
  Helvetica: 'value',
  'Helvetica-Oblique': 'value',
  F1: 'label',
  F2: 'value',
  F3: 'value',
};

function isSupportedEncoding(label: string): boolean {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
}

export const extractorConfigSchema = z.object({
  fontRoles: z.record(z.enum(['label', 'value'])).default(DEFAULT_FONT_ROLES),
  textEncoding: z
    .string()
    .min(1)
    .refine(isSupportedEncoding, { message: 'unsupported text encoding' })
    .default('windows-1252'),
  columnContinuation: z.boolean().default(true),
  emitTrailingEmptyUsageLocation: z.boolean().default(true),
  concurrency: z.number().int().positive().default(4),
});

export type ExtractorConfig = z.infer<typeof extractorConfigSchema>;
export type ExtractorConfigInput = z.input<typeof extractorConfigSchema>;

export type ConfigEnv = Record<string, string | undefined>;

const BOOLEAN_ENV: Record<string, boolean> = { true: true, '1': true, false: false, '0': false };

function fromEnv(env: ConfigEnv): Record<string, unknown> {
  const raw: Record<string, unknown> = {};

  if (env.WRX_CONCURRENCY !== undefined) {
    raw.concurrency = Number(env.WRX_CONCURRENCY);
  }
  if (env.WRX_TEXT_ENCODING !== undefined) {
    raw.textEncoding = env.WRX_TEXT_ENCODING;
  }
  if (env.WRX_COLUMN_CONTINUATION !== undefined) {
    raw.columnContinuation = BOOLEAN_ENV[env.WRX_COLUMN_CONTINUATION.trim().toLowerCase()] ?? env.WRX_COLUMN_CONTINUATION;
  }
  if (env.WRX_FONT_ROLES !== undefined) {
    try {
      raw.fontRoles = JSON.parse(env.WRX_FONT_ROLES);
    } catch (err) {
      throw new ConfigError(`WRX_FONT_ROLES is not valid JSON: ${String(err)}`, [
        { field: 'fontRoles', message: 'expected a JSON object' },
      ]);
    }
  }

  return raw;
}

/**
 * Builds the extractor configuration from defaults, `WRX_*` environment
 * variables and explicit overrides, in increasing precedence.
 */
export function loadConfig(overrides: ExtractorConfigInput = {}, env: ConfigEnv = process.env): ExtractorConfig {
  const parsed = extractorConfigSchema.safeParse({ ...fromEnv(env), ...overrides });
  if (!parsed.success) {
    throw ConfigError.fromZodError(parsed.error);
  }
  return parsed.data;
}
