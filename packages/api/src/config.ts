import { z } from 'zod';
import { ValidationError } from '@requisition/core';

const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().min(1).max(65535).default(3000)),
  DB_HOST: z.preprocess(blankAsUndefined, z.string().min(1).default('localhost')),
  DB_PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(5432)),
  DB_NAME: z.preprocess(blankAsUndefined, z.string().min(1).default('requisition')),
  DB_USER: z.preprocess(blankAsUndefined, z.string().min(1).default('requisition')),
  DB_PASSWORD: z.string().default('requisition'),
  DB_POOL_MAX: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(10)),
  JWT_SECRET: z.preprocess(blankAsUndefined, z.string().optional()),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  RECEIPT_QUANTITY_TOLERANCE: z.preprocess(blankAsUndefined, z.coerce.number().min(0).default(0)),
  RECEIPT_PRICE_TOLERANCE: z.preprocess(blankAsUndefined, z.coerce.number().min(0).default(0)),
  PO_NUMBER_PREFIX: z
    .string()
    .regex(/^[A-Z0-9]{1,10}$/, 'must be 1-10 uppercase letters or digits')
    .default('PO'),
  PO_GENERATION_TIMEOUT_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(5000)),
  RULES_FILE: z.preprocess(blankAsUndefined, z.string().optional()),
});

export interface AppConfig {
  port: number;
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    max: number;
  };
  jwtSecret?: string;
  logLevel: string;
  receiptTolerance: { quantity: number; price: number };
  poNumberPrefix: string;
  poGenerationTimeoutMs: number;
  rulesFile?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue.path.join('.');
    throw new ValidationError(`Invalid configuration ${variable}: ${issue.message}`, variable);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    database: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      database: e.DB_NAME,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      max: e.DB_POOL_MAX,
    },
    jwtSecret: e.JWT_SECRET,
    logLevel: e.LOG_LEVEL,
    receiptTolerance: {
      quantity: e.RECEIPT_QUANTITY_TOLERANCE,
      price: e.RECEIPT_PRICE_TOLERANCE,
    },
    poNumberPrefix: e.PO_NUMBER_PREFIX,
    poGenerationTimeoutMs: e.PO_GENERATION_TIMEOUT_MS,
    rulesFile: e.RULES_FILE,
  };
}
