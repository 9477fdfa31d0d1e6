import { z } from 'zod';
import { ConfigurationError, isIsoDate } from '@hourwise/shared';

const hour = z.coerce.number().int().min(0).max(23);

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v.length > 0 ? v : undefined))
  .optional();

const idList = z
  .string()
  .trim()
  .default('')
  .transform((v, ctx) => {
    const ids: number[] = [];
    for (const part of v.split(',').map((p) => p.trim()).filter(Boolean)) {
      const id = Number.parseInt(part, 10);
      if (!Number.isInteger(id) || String(id) !== part) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid branch id: ${part}` });
        return z.NEVER;
      }
      ids.push(id);
    }
    return ids;
  });

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export const envSchema = z
  .object({
    DATABASE_URL: optionalString,
    SQLITE_PATH: z.string().trim().min(1).default('./data/hourwise.db'),
    APP_TIMEZONE: z.string().trim().default('Europe/Moscow').refine(isTimeZone, 'Unknown IANA timezone'),
    BENCHMARK_START_HOUR: hour.default(10),
    BENCHMARK_END_HOUR: hour.default(21),
    SCHEDULING_API_BASE_URL: z.string().trim().url().default('https://api.yclients.com'),
    SCHEDULING_PARTNER_TOKEN: optionalString,
    SCHEDULING_USER_TOKEN: optionalString,
    SCHEDULING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    SCHEDULING_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
    SCHEDULING_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(50),
    ACTIVE_BRANCH_IDS: idList,
    BRANCH_START_DATE: optionalString.refine((v) => v === undefined || isIsoDate(v), 'Expected YYYY-MM-DD'),
    GROUP_CONFIG_PATH: z.string().trim().min(1).default('./config/groups.json'),
    GROUP_CACHE_TTL_MS: z.coerce.number().int().min(0).default(300_000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .refine((env) => env.BENCHMARK_START_HOUR <= env.BENCHMARK_END_HOUR, {
    message: 'BENCHMARK_START_HOUR must not exceed BENCHMARK_END_HOUR',
    path: ['BENCHMARK_START_HOUR'],
  });

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  database: { kind: 'postgres'; url: string } | { kind: 'sqlite'; path: string };
  timezone: string;
  benchmark: { startHour: number; endHour: number };
  scheduling: {
    baseUrl: string;
    partnerToken?: string;
    userToken?: string;
    timeoutMs: number;
    retries: number;
    pageSize: number;
  };
  activeBranchIds: number[];
  branchStartDate?: string;
  groupConfigPath: string;
  groupCacheTtlMs: number;
  logLevel: Env['LOG_LEVEL'];
}

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid environment: ${details.join('; ')}`);
  }
  const env = parsed.data;
  const url = env.DATABASE_URL;
  return {
    database: url && url.startsWith('postgres') ? { kind: 'postgres', url } : { kind: 'sqlite', path: env.SQLITE_PATH },
    timezone: env.APP_TIMEZONE,
    benchmark: { startHour: env.BENCHMARK_START_HOUR, endHour: env.BENCHMARK_END_HOUR },
    scheduling: {
      baseUrl: env.SCHEDULING_API_BASE_URL.replace(/\/+$/, ''),
      partnerToken: env.SCHEDULING_PARTNER_TOKEN,
      userToken: env.SCHEDULING_USER_TOKEN,
      timeoutMs: env.SCHEDULING_TIMEOUT_MS,
      retries: env.SCHEDULING_RETRIES,
      pageSize: env.SCHEDULING_PAGE_SIZE,
    },
    activeBranchIds: env.ACTIVE_BRANCH_IDS,
    branchStartDate: env.BRANCH_START_DATE,
    groupConfigPath: env.GROUP_CONFIG_PATH,
    groupCacheTtlMs: env.GROUP_CACHE_TTL_MS,
    logLevel: env.LOG_LEVEL,
  };
}
