import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

/**
 * Token lifetimes are written like `30m` or `7d`; jsonwebtoken receives them
 * as seconds. A bare number is already seconds.
 */
export const parseDuration = (value: string): number => {
  const match = /^(\d+)\s*([smhd]?)$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid duration: ${value}`);
  }

  const units: Record<string, number> = { '': 1, s: 1, m: 60, h: 3600, d: 86400 };
  return parseInt(match[1]) * units[match[2]];
};

export const appConfig = {
  port: parseInt(process.env.APP_PORT || process.env.PORT || '3000'),
  nodeEnv: process.env.NODE_ENV || 'development',
  jwtSecret: process.env.JWT_SECRET || 'secret',
  jwtExpiresIn: parseDuration(process.env.JWT_EXPIRES_IN || '30m'),
  jwtRefreshExpiresIn: parseDuration(process.env.JWT_REFRESH_EXPIRES_IN || '7d'),
  corsOrigins: parseCorsOrigins(),
  maxFileSize: parseInt(process.env.MAX_FILE_SIZE || '5242880'), // 5MB
  uploadDir: process.env.UPLOAD_DIR || './media',
};

export const logConfig = {
  level: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  // File transports are only attached when a directory is configured
  dir: process.env.LOG_DIR || '',
  rotationSize: process.env.LOG_ROTATION_SIZE || '10m',
  retention: process.env.LOG_RETENTION || '30d',
};
