import { registerAs } from '@nestjs/config';

type Env = Record<string, string | undefined>;

/**
 * Process-wide settings, built once at startup and frozen. Components receive it through
 * `@Inject(appConfig.KEY)` instead of reading `process.env` on their own.
 */
export type AppConfig = Readonly<{
  botToken: string | null;
  /** Telegram ids of operators; they always see the Admin entry. */
  adminIds: readonly string[];
  trialDays: number;
  referredTrialDays: number;
  supportUsername: string;
  /** Empty for Telegram Stars (XTR). */
  paymentProviderToken: string;
  paymentsPayloadSecret: string | null;
  /** Bearer secret for the HTTP admin endpoints; they stay closed while unset. */
  adminApiToken: string | null;
  /** Webhook mode when set, long polling otherwise. */
  webhookUrl: string | null;
  port: number;
  databaseUrl: string | null;
  dbPath: string;
}>;

function str(v: string | undefined): string | null {
  const s = String(v ?? '').trim();
  return s ? s : null;
}

function int(v: string | undefined, fallback: number): number {
  const n = parseInt(String(v ?? ''), 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function parseAdminIds(raw: string | undefined): string[] {
  return String(raw ?? '')
    .split(',')
    .map((x) => x.trim())
    .filter((x) => /^\d+$/.test(x));
}

export function loadAppConfig(env: Env): AppConfig {
  return Object.freeze({
    botToken: str(env.BOT_TOKEN),
    adminIds: Object.freeze(parseAdminIds(env.ADMIN_IDS)),
    trialDays: int(env.TRIAL_DAYS, 3),
    referredTrialDays: int(env.REFERRED_TRIAL_DAYS, 7),
    supportUsername: str(env.SUPPORT_USERNAME) ?? '@Support',
    paymentProviderToken: str(env.PAYMENT_PROVIDER_TOKEN) ?? '',
    paymentsPayloadSecret: str(env.PAYMENTS_PAYLOAD_SECRET),
    adminApiToken: str(env.ADMIN_API_TOKEN),
    webhookUrl: str(env.WEBHOOK_URL),
    port: int(env.PORT, 8080),
    databaseUrl: str(env.DATABASE_URL),
    dbPath: str(env.DB_PATH) ?? 'vpn_shop.db',
  });
}

export const appConfig = registerAs('app', () => loadAppConfig(process.env));

export function isAdmin(config: AppConfig, userId: string): boolean {
  return config.adminIds.includes(userId);
}
