import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(2582),
  RECOVERY_WINDOW_HOURS: z.coerce.number().positive().default(72),
  EXPORT_MAX_COUNT: z.coerce.number().int().min(1).default(1000),
  /** When set, POST /import requires `Authorization: Bearer <token>` */
  IMPORT_TOKEN: z.string().min(1).optional(),
});

export interface MirrorConfig {
  readonly port: number;
  readonly recoveryWindowMs: number;
  readonly exportMaxCount: number;
  readonly importToken?: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): MirrorConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const { PORT, RECOVERY_WINDOW_HOURS, EXPORT_MAX_COUNT, IMPORT_TOKEN } = parsed.data;
  return {
    port: PORT,
    recoveryWindowMs: RECOVERY_WINDOW_HOURS * 60 * 60 * 1000,
    exportMaxCount: EXPORT_MAX_COUNT,
    importToken: IMPORT_TOKEN,
  };
}
