import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  // Game
  gameFile: string;
  aiOnly: boolean;
  seed: number | undefined;
  maxTurns: number;

  // Human input (seconds, 0 = wait forever)
  promptTimeout: number;

  // Status server (0 = disabled)
  statusPort: number;

  // Result storage
  mongoUri: string | undefined;

  logLevel: string;

  // Derived
  isProduction: boolean;
  isTest: boolean;
  hasMongo: boolean;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function getEnvOptionalNumber(key: string): number | undefined {
  const value = process.env[key];
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function loadConfig(): Config {
  const mongoUri = process.env.MONGO_URI || undefined;

  return {
    // Game
    gameFile: process.env.GAME_FILE || 'data/classic.json',
    aiOnly: getEnvBoolean('AI_ONLY', false),
    seed: getEnvOptionalNumber('SEED'),
    maxTurns: getEnvNumber('MAX_TURNS', 0),

    promptTimeout: getEnvNumber('PROMPT_TIMEOUT', 0),
    statusPort: getEnvNumber('STATUS_PORT', 0),

    mongoUri: mongoUri && mongoUri.trim() !== '' ? mongoUri : undefined,

    logLevel: process.env.LOG_LEVEL || 'info',

    // Derived
    isProduction: process.env.NODE_ENV === 'production',
    isTest: process.env.NODE_ENV === 'test',
    hasMongo: !!(mongoUri && mongoUri.trim() !== ''),
  };
}

export const config = loadConfig();

// Log config on startup (excluding sensitive data)
export function getPublicConfig(): Omit<Config, 'mongoUri'> & { mongoUri: string } {
  return {
    ...config,
    mongoUri: config.hasMongo ? '[REDACTED]' : '[NOT SET]',
  };
}
