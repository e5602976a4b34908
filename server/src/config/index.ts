import path from 'path';

export type RemovalBackend = 'local' | 'http';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  dataDir: string;
  uploadDir: string;
  resultDir: string;
  tempDir: string;
  workerConcurrency: number;
  taskRetentionMs: number;
  collaboratorTimeoutMs: number;
  maxUploadBytes: number;
  removalBackend: RemovalBackend;
  removalServiceUrl: string | null;
  geminiApiKey: string | null;
  geminiApiUrl: string;
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * Build the service configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = path.resolve(env.DATA_DIR || './data');
  const removalBackend = env.REMOVAL_BACKEND || 'local';
  if (removalBackend !== 'local' && removalBackend !== 'http') {
    throw new Error(`REMOVAL_BACKEND must be "local" or "http", got "${removalBackend}"`);
  }
  const removalServiceUrl = env.REMOVAL_SERVICE_URL || null;
  if (removalBackend === 'http' && !removalServiceUrl) {
    throw new Error('REMOVAL_SERVICE_URL is required when REMOVAL_BACKEND=http');
  }

  return {
    port: readInt(env, 'PORT', 3001),
    nodeEnv: env.NODE_ENV || 'development',
    dataDir,
    uploadDir: path.join(dataDir, 'uploads'),
    resultDir: path.join(dataDir, 'results'),
    tempDir: path.join(dataDir, 'temp_processing'),
    workerConcurrency: Math.max(1, readInt(env, 'WORKER_CONCURRENCY', 2)),
    taskRetentionMs: readInt(env, 'TASK_RETENTION_MS', 60 * 60 * 1000),
    collaboratorTimeoutMs: readInt(env, 'COLLABORATOR_TIMEOUT_MS', 120000),
    maxUploadBytes: readInt(env, 'MAX_UPLOAD_BYTES', 20 * 1024 * 1024),
    removalBackend,
    removalServiceUrl,
    geminiApiKey: env.GEMINI_API_KEY || env.GOOGLE_API_KEY || null,
    geminiApiUrl: env.GEMINI_API_URL || 'https://generativelanguage.googleapis.com/v1beta'
  };
}
