export interface AppConfig {
  port: number;
  corsOrigin: string;
  database: {
    path: string;
    synchronize: boolean;
    busyTimeoutMs: number;
    writeRetries: number;
  };
  upload: {
    maxBytes: number;
  };
  webhooks: {
    documentUrl: string;
    docxFilenamePrefix: string;
    chatUrl: string;
    chatTimeoutMs: number;
  };
  dispatch: {
    concurrency: number;
  };
  history: {
    filenameCaseSensitive: boolean;
  };
  logLevel: string;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

function readInt(
  env: Env,
  name: string,
  fallback: number,
  min = 0,
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  const value = Number(raw);
  if (value < min) {
    throw new Error(`${name} must be >= ${min}, got ${value}`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new Error(`${name} must be true or false, got "${raw}"`);
}

export const DEFAULT_MAX_UPLOAD_BYTES = 16 * 1024 * 1024;

export function buildConfig(env: Env): AppConfig {
  return {
    port: readInt(env, 'PORT', 3002, 1),
    corsOrigin: readString(env, 'CORS_ORIGIN', 'http://localhost:3001'),
    database: {
      path: readString(env, 'DATABASE_PATH', 'demand_letters.db'),
      synchronize: readBool(env, 'DATABASE_SYNCHRONIZE', true),
      busyTimeoutMs: readInt(env, 'DATABASE_BUSY_TIMEOUT_MS', 5000),
      writeRetries: readInt(env, 'DATABASE_WRITE_RETRIES', 5),
    },
    upload: {
      maxBytes: readInt(env, 'MAX_UPLOAD_BYTES', DEFAULT_MAX_UPLOAD_BYTES, 1),
    },
    webhooks: {
      documentUrl: readString(
        env,
        'DOCUMENT_WEBHOOK_URL',
        'http://localhost:5678/webhook/document',
      ),
      docxFilenamePrefix: readString(
        env,
        'DOCX_FILENAME_PREFIX',
        'demand_letter',
      ),
      chatUrl: readString(
        env,
        'CHAT_WEBHOOK_URL',
        'http://localhost:5678/webhook/chat',
      ),
      chatTimeoutMs: readInt(env, 'CHAT_WEBHOOK_TIMEOUT_MS', 60000, 1),
    },
    dispatch: {
      concurrency: readInt(env, 'DISPATCH_CONCURRENCY', 4, 1),
    },
    history: {
      filenameCaseSensitive: readBool(
        env,
        'HISTORY_FILENAME_CASE_SENSITIVE',
        false,
      ),
    },
    logLevel: readString(env, 'LOG_LEVEL', 'info'),
  };
}

export default (): AppConfig => buildConfig(process.env);
