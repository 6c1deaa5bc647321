import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  SESSION_TTL_MINUTES: z.coerce.number().positive().default(60),
  SESSION_SWEEP_SECONDS: z.coerce.number().positive().default(300),
});

export interface ServerConfig {
  port: number;
  host: string;
  sessionTtlMs: number;
  sweepIntervalMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid server configuration: ${details}`);
  }
  const { PORT, HOST, SESSION_TTL_MINUTES, SESSION_SWEEP_SECONDS } = parsed.data;
  return {
    port: PORT,
    host: HOST,
    sessionTtlMs: SESSION_TTL_MINUTES * 60_000,
    sweepIntervalMs: SESSION_SWEEP_SECONDS * 1000,
  };
}
