import path from 'node:path';
import { z } from 'zod';

const emptyToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const serverEnvSchema = z.object({
  PLIST_ASSET_ROOT: z.preprocess(emptyToUndefined, z.string().trim().default('plists')),
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).default(8787)),
  HOST: z.preprocess(emptyToUndefined, z.string().trim().default('127.0.0.1')),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  IDENTIFICATION_HEADER: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .trim()
      .regex(/^[A-Za-z0-9-]+$/)
      .default('user-agent')
      .transform((v) => v.toLowerCase()),
  ),
});

export type LogLevel = z.infer<typeof serverEnvSchema>['LOG_LEVEL'];

export type ServerConfig = {
  assetRoot: string;
  port: number;
  host: string;
  logLevel: LogLevel;
  identificationHeader: string;
};

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = serverEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid server configuration: ${problems.join('; ')}`);
  }

  return {
    // Relative roots are taken from the working directory the server starts in.
    assetRoot: path.resolve(parsed.data.PLIST_ASSET_ROOT),
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    logLevel: parsed.data.LOG_LEVEL,
    identificationHeader: parsed.data.IDENTIFICATION_HEADER,
  };
}
