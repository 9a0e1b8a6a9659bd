/**
 * Application configuration - loads environment variables and provides type-safe config
 * Supports .env style key.env file (key.env overrides the process environment)
 */
import path from 'path';
import { readFileSync, existsSync } from 'fs';

/**
 * Loads key.env from the working directory into process.env
 */
function loadKeyEnvSync(): void {
  const keyEnvPath = path.join(process.cwd(), 'key.env');
  if (!existsSync(keyEnvPath)) {
    return;
  }

  const content = readFileSync(keyEnvPath, 'utf-8');
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    const equalIndex = trimmed.indexOf('=');
    if (equalIndex > 0) {
      const key = trimmed.substring(0, equalIndex).trim();
      const value = trimmed.substring(equalIndex + 1).trim();
      process.env[key] = value.replace(/^["']|["']$/g, '');
    }
  }
}

// Load key.env at module initialization
loadKeyEnvSync();

type Env = Record<string, string | undefined>;

/**
 * Parses string to integer, returns default if invalid
 */
export function parseNumber(value: string, defaultValue: number): number {
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parses string to float, returns default if invalid
 */
export function parseDecimal(value: string, defaultValue: number): number {
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Type-safe application configuration structure
 */
export interface AppConfig {
  server: {
    port: number;
    nodeEnv: string;
    exposeErrorDetail: boolean;
  };
  ai: {
    timeout: number;
    gemini: {
      apiKey: string;
      model: string;
      baseUrl: string;
    };
    generation: {
      temperature: number;
      topP: number;
      topK: number;
      maxOutputTokens: number;
    };
  };
  throttle: {
    minIntervalMs: number;
  };
  cache: {
    ttlMs: number;
    maxEntries: number;
  };
  persona: {
    personasDir: string;
    generalFile: string;
    roundStartFile: string;
  };
  database: {
    url: string;
    poolMin: number;
    poolMax: number;
  };
  logging: {
    logLevel: string;
    timezone: string;
  };
}

/**
 * Builds configuration from an environment map
 * Error details reach response bodies only when NODE_ENV is explicitly "development"
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const optionalEnv = (key: string, defaultValue: string): string => env[key] ?? defaultValue;
  const nodeEnv = optionalEnv('NODE_ENV', 'production');

  return {
    server: {
      port: parseNumber(optionalEnv('PORT', '5000'), 5000),
      nodeEnv,
      exposeErrorDetail: nodeEnv === 'development',
    },
    ai: {
      timeout: parseNumber(optionalEnv('AI_TIMEOUT_MS', '30000'), 30000),
      gemini: {
        apiKey: optionalEnv('GEMINI_API_KEY', ''),
        model: optionalEnv('GEMINI_MODEL', 'gemini-2.0-flash'),
        baseUrl: optionalEnv('GEMINI_BASE_URL', 'https://generativelanguage.googleapis.com/v1beta'),
      },
      generation: {
        temperature: parseDecimal(optionalEnv('AI_TEMPERATURE', '0.35'), 0.35),
        topP: parseDecimal(optionalEnv('AI_TOP_P', '0.95'), 0.95),
        topK: parseNumber(optionalEnv('AI_TOP_K', '40'), 40),
        maxOutputTokens: parseNumber(optionalEnv('AI_MAX_OUTPUT_TOKENS', '150'), 150),
      },
    },
    throttle: {
      minIntervalMs: parseNumber(optionalEnv('THROTTLE_INTERVAL_MS', '1000'), 1000),
    },
    cache: {
      ttlMs: parseNumber(optionalEnv('CACHE_TTL_MS', '300000'), 300000),
      maxEntries: parseNumber(optionalEnv('CACHE_MAX_ENTRIES', '500'), 500),
    },
    persona: {
      personasDir: optionalEnv('PERSONAS_DIR', path.join(process.cwd(), 'personas')),
      generalFile: optionalEnv('PERSONA_GENERAL_FILE', 'seraph.md'),
      roundStartFile: optionalEnv('PERSONA_ROUND_START_FILE', 'seraph-round-start.md'),
    },
    database: {
      url: optionalEnv('DATABASE_URL', ''),
      poolMin: parseNumber(optionalEnv('DB_POOL_MIN', '1'), 1),
      poolMax: parseNumber(optionalEnv('DB_POOL_MAX', '10'), 10),
    },
    logging: {
      logLevel: optionalEnv('LOG_LEVEL', 'INFO'),
      timezone: optionalEnv('LOG_TIMEZONE', 'UTC'),
    },
  };
}

export const config: AppConfig = loadConfig();
