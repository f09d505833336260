import { ConfigService } from '@nestjs/config';

export const DEFAULT_WEB_APP_URL = 'http://localhost:4200';

export interface CorsPolicy {
  origins: string[];
  /** Requests without an Origin header (curl, server-to-server) */
  allowMissingOrigin: boolean;
}

export type OriginCallback = (err: Error | null, allow?: boolean) => void;
export type OriginCheck = (origin: string | undefined, callback: OriginCallback) => void;

/**
 * Allowed browser origins: CORS_ORIGINS (comma separated), or the web app
 * itself outside production. Production requires CORS_ORIGINS.
 */
export function resolveCorsPolicy(configService: ConfigService): CorsPolicy {
  const isProduction = configService.get<string>('NODE_ENV') === 'production';
  const configured = (configService.get<string>('CORS_ORIGINS') ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  if (isProduction && configured.length === 0) {
    throw new Error('CORS_ORIGINS must be set in production');
  }

  return {
    origins: configured.length > 0 ? configured : [configService.get<string>('WEB_APP_URL') || DEFAULT_WEB_APP_URL],
    allowMissingOrigin: !isProduction,
  };
}

export function originCheck(policy: CorsPolicy, onBlocked: (origin: string) => void = () => undefined): OriginCheck {
  return (origin, callback) => {
    if (!origin) {
      callback(policy.allowMissingOrigin ? null : new Error('CORS: Origin required'), policy.allowMissingOrigin);
      return;
    }
    if (policy.origins.includes(origin)) {
      callback(null, true);
      return;
    }
    onBlocked(origin);
    callback(new Error('Not allowed by CORS'));
  };
}
