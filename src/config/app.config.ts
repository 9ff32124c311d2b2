import { registerAs } from '@nestjs/config';
import { z } from 'zod';

/**
 * Konfigurasi aplikasi
 *
 * Semua environment variable dibaca dan divalidasi di satu tempat ini,
 * sehingga service lain cukup mengambil object `AppConfig` yang sudah
 * bertipe lewat `configService.getOrThrow<AppConfig>('app')`.
 *
 * Nilai uang selalu integer Rupiah. Fee rate ditulis sebagai desimal
 * (contoh: 0.007) tapi langsung dikonversi ke parts-per-million supaya
 * perhitungan fee tidak pernah menyentuh floating point.
 */

export const FEE_RATE_SCALE = 1_000_000;

/**
 * Parse string desimal ("0.007") menjadi parts-per-million (7000)
 * tanpa melewati Number floating point.
 */
export function parseFeeRate(value: string): number {
  const match = /^(\d+)(?:\.(\d{1,6}))?$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid fee rate "${value}": expected a decimal with at most 6 fraction digits`);
  }
  const whole = Number(match[1]);
  const fraction = Number((match[2] ?? '').padEnd(6, '0'));
  const ppm = whole * FEE_RATE_SCALE + fraction;
  if (ppm > FEE_RATE_SCALE) {
    throw new Error(`Invalid fee rate "${value}": must not exceed 1`);
  }
  return ppm;
}

const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== '' ? val.trim() : undefined));

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),

  DATABASE_PATH: z.string().default('./data/store.db'),
  AUDIT_DATABASE_PATH: z.string().default('./data/audit.db'),

  INTERNAL_API_KEY: z.string().min(16, { message: 'INTERNAL_API_KEY minimal 16 karakter' }),
  ADMIN_USER_IDS: z
    .string()
    .default('')
    .transform((val) =>
      val
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id !== '')
        .map((id) => Number(id)),
    )
    .refine((ids) => ids.every((id) => Number.isSafeInteger(id) && id > 0), {
      message: 'ADMIN_USER_IDS harus berisi daftar ID numerik dipisah koma',
    }),

  PAKASIR_BASE_URL: z.string().url().default('https://app.pakasir.com'),
  PAKASIR_API_KEY: z.string().min(1),
  PAKASIR_PROJECT_SLUG: z.string().min(1),
  PAKASIR_PAYMENT_DOMAIN: z.string().url().default('https://app.pakasir.com'),
  PAYMENT_WEBHOOK_SECRET: optionalString,

  PAYMENT_FEE_RATE: z.string().default('0.007').transform(parseFeeRate),
  PAYMENT_FEE_FIXED: z.coerce.number().int().nonnegative().default(310),
  PAYMENT_EXPIRY_MINUTES: z.coerce.number().int().positive().default(10),
  SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  GATEWAY_DOWN_POLICY: z.enum(['block', 'balance_fallback']).default('block'),

  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_SECURE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),
  SMTP_USER: optionalString,
  SMTP_PASSWORD: optionalString,
  ADMIN_ALERT_EMAIL: optionalString,
});

export type GatewayDownPolicy = 'block' | 'balance_fallback';

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  database: {
    path: string;
    auditPath: string;
  };
  internalApiKey: string;
  adminUserIds: number[];
  gateway: {
    baseUrl: string;
    apiKey: string;
    projectSlug: string;
    paymentDomain: string;
    webhookSecret?: string;
    downPolicy: GatewayDownPolicy;
  };
  payment: {
    feeRatePpm: number;
    fixedFee: number;
    expiryMinutes: number;
    sweepIntervalMs: number;
  };
  smtp: {
    host?: string;
    port: number;
    secure: boolean;
    user?: string;
    password?: string;
    alertRecipient?: string;
  };
}

export function buildAppConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    database: {
      path: e.DATABASE_PATH,
      auditPath: e.AUDIT_DATABASE_PATH,
    },
    internalApiKey: e.INTERNAL_API_KEY,
    adminUserIds: e.ADMIN_USER_IDS,
    gateway: {
      baseUrl: e.PAKASIR_BASE_URL.replace(/\/+$/, ''),
      apiKey: e.PAKASIR_API_KEY,
      projectSlug: e.PAKASIR_PROJECT_SLUG,
      paymentDomain: e.PAKASIR_PAYMENT_DOMAIN.replace(/\/+$/, ''),
      webhookSecret: e.PAYMENT_WEBHOOK_SECRET,
      downPolicy: e.GATEWAY_DOWN_POLICY,
    },
    payment: {
      feeRatePpm: e.PAYMENT_FEE_RATE,
      fixedFee: e.PAYMENT_FEE_FIXED,
      expiryMinutes: e.PAYMENT_EXPIRY_MINUTES,
      sweepIntervalMs: e.SWEEP_INTERVAL_MS,
    },
    smtp: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      secure: e.SMTP_SECURE,
      user: e.SMTP_USER,
      password: e.SMTP_PASSWORD,
      alertRecipient: e.ADMIN_ALERT_EMAIL,
    },
  };
}

export const appConfig = registerAs('app', () => buildAppConfig(process.env));
