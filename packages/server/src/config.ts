import { homedir } from 'os';
import { join } from 'path';

export type NodeEnv = 'development' | 'production' | 'test';

export interface EmbeddingConfig {
  apiUrl: string;
  apiKey: string;
  model: string;
  dimension: number;
}

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: NodeEnv;
  dbPath: string;
  corsOrigins: string[];
  embedding: EmbeddingConfig;
  /** Empty when consolidation is not configured; `POST /api/v1/sleep` then answers 503. */
  anthropicApiKey: string;
  consolidationModel: string;
  defaultWorkingTtlHours: number;
}

export const DEFAULT_CONSOLIDATION_MODEL = 'claude-3-5-haiku-20241022';

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  if (value === undefined || value === '') return 'development';
  if (value === 'development' || value === 'production' || value === 'test') return value;
  throw new Error(`NODE_ENV must be development, production or test, got "${value}"`);
}

function positiveNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

export function resolveOfflineBufferPath(): string {
  return process.env.OFFLINE_BUFFER_PATH || join(homedir(), '.stratamem_buffer.jsonl');
}

export function loadConfig(): ServerConfig {
  const nodeEnv = parseNodeEnv(process.env.NODE_ENV);
  const isDev = nodeEnv === 'development';

  return {
    port: positiveNumber('PORT', 8080),
    host: process.env.HOST || '0.0.0.0',
    nodeEnv,

    dbPath: process.env.DB_PATH || 'file:stratamem.db',

    corsOrigins: [
      'http://localhost:8080',
      'http://localhost:5173',
      ...(process.env.CORS_ORIGINS?.split(',').map(s => s.trim()).filter(Boolean) || []),
    ],

    embedding: {
      apiUrl: process.env.EMBEDDING_API_URL || (isDev
        ? 'http://localhost:11434/v1'
        : requireEnv('EMBEDDING_API_URL')),
      apiKey: process.env.EMBEDDING_API_KEY || '',
      model: process.env.EMBEDDING_MODEL || 'nomic-embed-text',
      dimension: positiveNumber('EMBEDDING_DIMENSION', 768),
    },

    anthropicApiKey: process.env.ANTHROPIC_API_KEY || '',
    consolidationModel: process.env.CONSOLIDATION_MODEL || DEFAULT_CONSOLIDATION_MODEL,
    defaultWorkingTtlHours: positiveNumber('DEFAULT_WORKING_TTL_HOURS', 2),
  };
}
