import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  port: number;
  corsOrigins: string[];
  datasetRoot: string; // API requests may only reach datasets below this directory
  defaults: {
    validationFraction: number;
    minSamples: number;
    randomSeed: number;
  };
}

const numberFromEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${name} must be a number (got "${raw}")`);
  }
  return value;
};

export function loadConfig(): Config {
  return {
    port: numberFromEnv('PORT', 4000),
    corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:5173,http://localhost:3000')
      .split(',')
      .map(origin => origin.trim())
      .filter(Boolean),
    datasetRoot: process.env.DATASET_ROOT || process.cwd(),
    defaults: {
      validationFraction: numberFromEnv('DEFAULT_VALIDATION_FRACTION', 0.2),
      minSamples: numberFromEnv('DEFAULT_MIN_SAMPLES', 10),
      randomSeed: numberFromEnv('DEFAULT_RANDOM_SEED', 1)
    }
  };
}

export const config = loadConfig();
