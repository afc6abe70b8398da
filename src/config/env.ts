import dotenv from 'dotenv';

dotenv.config();

interface EnvConfig {
  PORT: number;
  NODE_ENV: string;
  LOG_LEVEL: string;
  SKILLS_CSV_PATH: string;
  FUZZY_THRESHOLD_WEAK: number;
  FUZZY_THRESHOLD_STRONG: number;
  MIN_OCCURRENCE_FOR_STRONG: number;
  MAX_UPLOAD_MB: number;
  CORS_ORIGIN: string;
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid numeric environment variable: ${name}=${raw}`);
  }
  return value;
}

function validateEnv(): EnvConfig {
  const weak = readNumber('FUZZY_THRESHOLD_WEAK', 60);
  const strong = readNumber('FUZZY_THRESHOLD_STRONG', 80);

  if (weak > 100 || strong > 100) {
    throw new Error('Fuzzy thresholds must be between 0 and 100');
  }
  if (weak > strong) {
    throw new Error('FUZZY_THRESHOLD_WEAK must not exceed FUZZY_THRESHOLD_STRONG');
  }

  return {
    PORT: parseInt(process.env.PORT || '3000', 10),
    NODE_ENV: process.env.NODE_ENV || 'development',
    LOG_LEVEL: process.env.LOG_LEVEL || 'info',
    SKILLS_CSV_PATH: process.env.SKILLS_CSV_PATH || 'skills.csv',
    FUZZY_THRESHOLD_WEAK: weak,
    FUZZY_THRESHOLD_STRONG: strong,
    MIN_OCCURRENCE_FOR_STRONG: Math.max(1, Math.floor(readNumber('MIN_OCCURRENCE_FOR_STRONG', 2))),
    MAX_UPLOAD_MB: readNumber('MAX_UPLOAD_MB', 10),
    CORS_ORIGIN: process.env.CORS_ORIGIN || '*'
  };
}

export const env = validateEnv();
