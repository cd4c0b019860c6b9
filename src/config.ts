import 'dotenv/config';
import { createLogger } from './utils/logger.js';

function env(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function envInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer, got: ${value}`);
  }
  return parsed;
}

export const config = {
  database: {
    url: env('INKPRESS_DATABASE_URL', './data/inkpress.db'),
  },

  apiKeys: {
    anthropic: env('ANTHROPIC_API_KEY', ''),
    googleAi: env('GOOGLE_AI_API_KEY', ''),
  },

  google: {
    project: env('GOOGLE_CLOUD_PROJECT', ''),
    location: env('GOOGLE_CLOUD_LOCATION', 'us-central1'),
  },

  ai: {
    claude: {
      model: env('ANTHROPIC_MODEL', 'claude-sonnet-4-5-20250929'),
      maxTokens: envInt('ANTHROPIC_MAX_TOKENS', 4000),
      timeoutMs: envInt('ANTHROPIC_TIMEOUT_MS', 120_000),
    },
    imagen: {
      model: env('IMAGEN_MODEL', 'imagen-4.0-generate-001'),
      timeoutMs: envInt('IMAGEN_TIMEOUT_MS', 60_000),
    },
  },

  content: {
    featuresFile: env('INKPRESS_FEATURES_FILE', './data/features.json'),
  },
} as const;

export function validateConfig(): void {
  const logger = createLogger('config');
  const warnings: string[] = [];

  if (!config.apiKeys.anthropic) {
    warnings.push('ANTHROPIC_API_KEY is not set; blog post generation will fail');
  }
  if (!config.apiKeys.googleAi && !config.google.project) {
    warnings.push('Neither GOOGLE_AI_API_KEY nor GOOGLE_CLOUD_PROJECT is set; image generation will fail');
  }

  for (const warning of warnings) {
    logger.warn(warning);
  }
}
