/**
 * Configuration settings for the knowledge graph index service
 */
import { config } from 'dotenv';
import { ConfigurationError } from '../errors';

// Load environment variables from .env file if present
config();

// Environment mapping for log levels
const LOG_LEVELS: Record<string, string> = {
  development: 'debug',
  test: 'debug',
  production: 'info',
};

type Env = Record<string, string | undefined>;

export interface RemoteServiceConfig {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export interface AppConfig {
  service: {
    name: string;
    version: string;
  };
  logging: {
    level: string;
    prettyPrint: boolean;
  };
  embedding: RemoteServiceConfig & {
    dimensions: number;
  };
  extraction: RemoteServiceConfig & {
    maxEntitiesPerChunk: number;
  };
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
  storage: {
    path: string;
    timeoutMs: number;
  };
  http: {
    port: number;
    host: string;
  };
}

function readInt(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readKey(env: Env, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = env[key];
    if (value && value.trim() !== '') {
      return value.trim();
    }
  }
  return null;
}

/**
 * Build the service configuration from environment variables.
 * Fails fast with a ConfigurationError on invalid sizing or storage settings.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || 'development';

  const chunkSize = readInt(env, 'KG_CHUNK_SIZE', 512, 1);
  const chunkOverlap = readInt(env, 'KG_CHUNK_OVERLAP', 50, 0);
  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      `KG_CHUNK_OVERLAP (${chunkOverlap}) must be smaller than KG_CHUNK_SIZE (${chunkSize})`
    );
  }

  const storagePath = env.STORAGE_PATH === undefined ? './data/knowledge-graph.db' : env.STORAGE_PATH.trim();
  if (storagePath === '') {
    throw new ConfigurationError('STORAGE_PATH must not be empty');
  }

  return {
    service: {
      name: 'knowledge-graph-index',
      version: env.npm_package_version || '0.1.0',
    },

    logging: {
      level: env.LOG_LEVEL || LOG_LEVELS[nodeEnv] || 'info',
      prettyPrint: nodeEnv !== 'production',
    },

    embedding: {
      apiKey: readKey(env, 'EMBEDDING_API_KEY'),
      baseUrl: env.EMBEDDING_API_URL || 'https://api.openai.com/v1',
      model: env.EMBEDDING_MODEL || 'text-embedding-3-small',
      timeoutMs: readInt(env, 'EMBEDDING_TIMEOUT_MS', 10000, 1),
      dimensions: readInt(env, 'EMBEDDING_DIMENSIONS', 384, 1),
    },

    extraction: {
      apiKey: readKey(env, 'EXTRACTION_API_KEY', 'OPENROUTER_API_KEY'),
      baseUrl: env.EXTRACTION_API_URL || 'https://openrouter.ai/api/v1',
      model: env.EXTRACTION_MODEL || 'deepseek/deepseek-chat-v3.1:free',
      timeoutMs: readInt(env, 'EXTRACTION_TIMEOUT_MS', 20000, 1),
      maxEntitiesPerChunk: readInt(env, 'KG_MAX_ENTITIES_PER_CHUNK', 10, 1),
    },

    chunking: {
      chunkSize,
      chunkOverlap,
    },

    storage: {
      path: storagePath,
      timeoutMs: readInt(env, 'STORAGE_TIMEOUT_MS', 5000, 0),
    },

    // HTTP server configuration
    http: {
      port: readInt(env, 'HTTP_PORT', 8002, 0),
      host: env.HTTP_HOST || '0.0.0.0',
    },
  };
}

/**
 * Configuration object for the knowledge graph index service
 */
export const Config: AppConfig = loadConfig();

// Export configuration as default
export default Config;
