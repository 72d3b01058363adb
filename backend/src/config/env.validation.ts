import { plainToInstance } from 'class-transformer';
import { IsInt, IsOptional, IsString, IsUrl, Matches, Max, Min, MinLength, validateSync } from 'class-validator';

export class EnvironmentVariables {
  @IsString() @IsOptional() BOT_TOKEN?: string;

  @Matches(/^[\d,\s]*$/, { message: 'ADMIN_IDS must be a comma-separated list of numeric ids' })
  @IsOptional()
  ADMIN_IDS?: string;

  @IsInt() @Min(1) @IsOptional() TRIAL_DAYS?: number;
  @IsInt() @Min(1) @IsOptional() REFERRED_TRIAL_DAYS?: number;

  @IsString() @IsOptional() SUPPORT_USERNAME?: string;
  @IsString() @IsOptional() PAYMENT_PROVIDER_TOKEN?: string;
  @IsString() @IsOptional() PAYMENTS_PAYLOAD_SECRET?: string;
  @IsString() @MinLength(16) @IsOptional() ADMIN_API_TOKEN?: string;

  @IsUrl({ require_tld: false, protocols: ['https', 'http'] }) @IsOptional() WEBHOOK_URL?: string;

  @IsInt() @Min(1) @Max(65535) @IsOptional() PORT?: number;

  @IsString() @IsOptional() DATABASE_URL?: string;
  @IsString() @IsOptional() DB_PATH?: string;
}

/** A variable set to an empty string counts as unset, the same way `loadAppConfig` reads it. */
function withoutBlanks(config: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(config).filter(([, v]) => !(typeof v === 'string' && v.trim() === '')));
}

/** `ConfigModule.forRoot({ validate })` hook: rejects malformed settings at startup. */
export function validateEnv(config: Record<string, unknown>): Record<string, unknown> {
  const parsed = plainToInstance(EnvironmentVariables, withoutBlanks(config), { enableImplicitConversion: true });
  const errors = validateSync(parsed, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors.map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`).join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return config;
}
