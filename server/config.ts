import path from 'path';
import { z } from 'zod';

const MB = 1024 * 1024;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  DATA_DIR: z.string().min(1).default('data'),
  UPLOAD_DIR: z.string().min(1).optional(),
  REPORTS_DIR: z.string().min(1).optional(),
  PLOTS_DIR: z.string().min(1).optional(),
  // Archives are validated against this ceiling before the pipeline sees them
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(500 * MB),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  uploadDir: string;
  reportsDir: string;
  plotsDir: string;
  maxUploadBytes: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }

  const values = parsed.data;
  const dataDir = path.resolve(values.DATA_DIR);

  return {
    env: values.NODE_ENV,
    port: values.PORT,
    uploadDir: path.resolve(values.UPLOAD_DIR ?? path.join(dataDir, 'uploads')),
    reportsDir: path.resolve(values.REPORTS_DIR ?? path.join(dataDir, 'reports')),
    plotsDir: path.resolve(values.PLOTS_DIR ?? path.join(dataDir, 'plots')),
    maxUploadBytes: values.MAX_UPLOAD_BYTES,
  };
}
