// API Gateway configuration, read from the environment
import { z } from 'zod';

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  CORS_ORIGINS: z.string().default('http://localhost:3000'),
  CAISO_OUTLOOK_BASE: z.string().url().optional(),
  CAISO_HISTORY_BASE: z.string().url().optional(),
  CAISO_OASIS_URL: z.string().url().optional(),
  LMP_POLITENESS_SECONDS: z.coerce.number().min(0).default(5)
});

export interface ApiConfig {
  port: number;
  corsOrigins: string[];
  outlookBase?: string;
  historyBase?: string;
  oasisUrl?: string;
  politenessSeconds: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ApiConfig {
  const parsed = ConfigSchema.parse(env);
  return {
    port: parsed.PORT,
    corsOrigins: parsed.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean),
    outlookBase: parsed.CAISO_OUTLOOK_BASE,
    historyBase: parsed.CAISO_HISTORY_BASE,
    oasisUrl: parsed.CAISO_OASIS_URL,
    politenessSeconds: parsed.LMP_POLITENESS_SECONDS
  };
}
