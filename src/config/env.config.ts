import 'dotenv/config';
import { z } from 'zod';

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number());

const optionalString = () =>
  z.preprocess((v) => (v === '' ? undefined : v), z.string().optional());

export const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: toNumber(3000),
  LOG_LEVEL: LogLevel.default('info'),

  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_MAX: toNumber(10),
  REDIS_URL: z.string().min(1, 'REDIS_URL is required'),
  REDIS_TTL: toNumber(1800),

  TIMEZONE: z.string().default('Europe/Rome'),

  RESEND_API_KEY: optionalString(),
  EMAIL_FROM: z.string().default('Room Booking <noreply@example.edu>'),

  GOOGLE_CALENDAR_ID: optionalString(),
  GOOGLE_SERVICE_ACCOUNT_EMAIL: optionalString(),
  GOOGLE_PRIVATE_KEY: optionalString(),

  REMINDER_LEAD_HOURS: toNumber(24),
  QUEUE_CONCURRENCY: toNumber(5),
  QUEUE_MAX_ATTEMPTS: toNumber(3),

  SIDE_EFFECT_TIMEOUT_MS: toNumber(5000),

  RATE_LIMIT_WINDOW_SEC: toNumber(60),
  RATE_LIMIT_MAX: toNumber(100),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    const message = [
      'Invalid environment configuration:',
      issues,
      'Update your .env or environment variables and try again.',
    ].join('\n');
    throw new Error(message);
  }
  return Object.freeze(parsed.data);
}

export const config: Readonly<AppConfig> = parseConfig(process.env);
