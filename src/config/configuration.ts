import { registerAs } from '@nestjs/config';

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export interface AppConfig {
  app: { port: number; environment: string };
  database: { host: string; port: number; username: string; password: string; database: string };
  redis: { host: string; port: number };
  auth: { jwtSecret: string };
  logging: { level: string; dir?: string };
  ads: { expirationDays: number };
  payments: { callbackAllowedIps: string };
}

export default registerAs(
  'config',
  (): AppConfig => ({
    app: {
      port: toInt(process.env.PORT, 3000),
      environment: process.env.NODE_ENV || 'development',
    },
    database: {
      host: process.env.DB_HOST || 'localhost',
      port: toInt(process.env.DB_PORT, 5432),
      username: process.env.DB_USERNAME || 'postgres',
      password: process.env.DB_PASSWORD || 'postgres',
      database: process.env.DB_NAME || 'marketplace',
    },
    redis: {
      host: process.env.REDIS_HOST || 'localhost',
      port: toInt(process.env.REDIS_PORT, 6379),
    },
    auth: {
      jwtSecret: process.env.JWT_SECRET || '',
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      dir: process.env.LOG_DIR || undefined,
    },
    ads: {
      expirationDays: toInt(process.env.AD_EXPIRATION_DAYS, 30),
    },
    payments: {
      // comma-separated; empty disables the allow-list
      callbackAllowedIps: process.env.PAYMENT_CALLBACK_ALLOWED_IPS || '',
    },
  }),
);
