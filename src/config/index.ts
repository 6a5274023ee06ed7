import { z, ZodError } from 'zod';

// ============================================
// Configuration schema
// ============================================

const positiveInt = z.coerce.number().int().positive();

const tierList = z
  .string()
  .transform((raw) => raw.split(',').map((part) => part.trim()).filter((part) => part.length > 0))
  .pipe(z.array(positiveInt).min(1))
  .transform((tiers) => [...tiers].sort((a, b) => a - b))
  .refine((tiers) => new Set(tiers).size === tiers.length, 'Tiers must be distinct');

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    port: positiveInt.max(65535).default(4000),
    logLevel: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
    corsOrigin: z.string().min(1).default('http://localhost:3000'),
    // Requests per client IP per 15-minute window
    rateLimitMax: positiveInt.default(300),
  }),
  database: z.object({
    url: z.string().url().default('postgres://localhost:5432/risk_register'),
    poolMax: positiveInt.max(100).default(10),
  }),
  auth: z.object({
    actorHeader: z
      .string()
      .regex(/^[a-z0-9-]+$/i, 'Header name may only contain letters, digits and dashes')
      .default('x-authenticated-user-id')
      .transform((name) => name.toLowerCase()),
  }),
  alerts: z.object({
    upcomingReviewDays: positiveInt.default(7),
    contractExpiryTiersDays: tierList.default('30,60,90'),
    supplierAssessmentMaxAgeDays: positiveInt.default(365),
    criticalSupplierThreshold: z.coerce.number().int().min(1).max(5).default(4),
    unmappedRiskAlertLimit: positiveInt.default(10),
  }),
  audit: z
    .object({
      defaultPageSize: positiveInt.default(50),
      maxPageSize: positiveInt.default(100),
    })
    .refine((audit) => audit.defaultPageSize <= audit.maxPageSize, {
      message: 'defaultPageSize must not exceed maxPageSize',
      path: ['defaultPageSize'],
    }),
});

type ParsedConfig = z.infer<typeof configSchema>;

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type Config = DeepReadonly<ParsedConfig>;
export type ServerConfig = Config['server'];
export type AlertConfig = Config['alerts'];
export type AuditConfig = Config['audit'];

export class ConfigError extends Error {
  constructor(public readonly issues: { field: string; message: string }[]) {
    super(`Invalid configuration: ${issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

// ============================================
// Loading
// ============================================

type Env = Record<string, string | undefined>;

// Empty strings count as unset so `.env` templates with blank values fall back to defaults
const read = (env: Env, key: string): string | undefined => {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  const raw = {
    server: {
      nodeEnv: read(env, 'NODE_ENV'),
      port: read(env, 'PORT'),
      logLevel: read(env, 'LOG_LEVEL'),
      corsOrigin: read(env, 'CORS_ORIGIN'),
      rateLimitMax: read(env, 'RATE_LIMIT_MAX'),
    },
    database: {
      url: read(env, 'DATABASE_URL'),
      poolMax: read(env, 'DATABASE_POOL_MAX'),
    },
    auth: {
      actorHeader: read(env, 'AUTH_ACTOR_HEADER'),
    },
    alerts: {
      upcomingReviewDays: read(env, 'ALERT_UPCOMING_REVIEW_DAYS'),
      contractExpiryTiersDays: read(env, 'ALERT_CONTRACT_EXPIRY_TIERS'),
      supplierAssessmentMaxAgeDays: read(env, 'ALERT_SUPPLIER_ASSESSMENT_MAX_AGE_DAYS'),
      criticalSupplierThreshold: read(env, 'ALERT_CRITICAL_SUPPLIER_THRESHOLD'),
      unmappedRiskAlertLimit: read(env, 'ALERT_UNMAPPED_RISK_LIMIT'),
    },
    audit: {
      defaultPageSize: read(env, 'AUDIT_DEFAULT_PAGE_SIZE'),
      maxPageSize: read(env, 'AUDIT_MAX_PAGE_SIZE'),
    },
  };

  try {
    return deepFreeze(configSchema.parse(raw));
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(
        error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message })),
      );
    }
    throw error;
  }
}
