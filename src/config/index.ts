import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  DATABASE_URL: z.string(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  PAGE_SIZE: z.coerce.number().int().positive().default(25),
  MAX_PAGE_SIZE: z.coerce.number().int().positive().default(100),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  // Directory of SQL migrations; the one shipped beside the sources unless set
  MIGRATIONS_DIR: z.string().optional(),
  // Comma-separated; keys simple search never filters on
  IGNORED_PARAMS: z
    .string()
    .default('limit,start,sort,dir,_dc,rm,xaction')
    .transform((s) => s.split(',').map((p) => p.trim()).filter(Boolean)),
});

export type AppConfig = z.infer<typeof envSchema>;

export const config: AppConfig = envSchema.parse(process.env);
