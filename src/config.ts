import path from 'path';
import winston from 'winston';
import logger from './utils/logger';

export interface AppConfig {
  inventoryFile: string;
  ollamaUrl: string;
  ollamaModel: string;
  generationTimeoutMs: number;
  sshPort: number;
  sshReadyTimeoutMs: number;
  sshCommandTimeoutMs: number;
  port: number;
  logLevel: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  inventoryFile: path.join(process.cwd(), 'inventory.csv'),
  ollamaUrl: 'http://localhost:11434',
  ollamaModel: 'codellama:7b',
  generationTimeoutMs: 60000,
  sshPort: 22,
  sshReadyTimeoutMs: 10000,
  sshCommandTimeoutMs: 15000,
  port: 4000,
  // 프로덕션에서는 info
  logLevel: 'debug',
};

const LOG_LEVELS = Object.keys(winston.config.npm.levels);

function readLogLevel(env: NodeJS.ProcessEnv): string {
  const fallback = env.NODE_ENV === 'production' ? 'info' : DEFAULT_CONFIG.logLevel;
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (!LOG_LEVELS.includes(raw)) {
    logger.warn(`[Config] Invalid LOG_LEVEL: ${env.LOG_LEVEL}, using ${fallback}`);
    return fallback;
  }
  return raw;
}

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logger.warn(`[Config] Invalid ${key}: ${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * 환경변수에서 설정 로드 (dotenv는 엔트리 포인트에서 먼저 호출)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    inventoryFile: env.INVENTORY_FILE
      ? path.resolve(env.INVENTORY_FILE)
      : DEFAULT_CONFIG.inventoryFile,
    ollamaUrl: env.OLLAMA_URL || DEFAULT_CONFIG.ollamaUrl,
    ollamaModel: env.OLLAMA_MODEL || DEFAULT_CONFIG.ollamaModel,
    generationTimeoutMs: readNumber(env, 'GENERATION_TIMEOUT_MS', DEFAULT_CONFIG.generationTimeoutMs),
    sshPort: readNumber(env, 'SSH_PORT', DEFAULT_CONFIG.sshPort),
    sshReadyTimeoutMs: readNumber(env, 'SSH_READY_TIMEOUT_MS', DEFAULT_CONFIG.sshReadyTimeoutMs),
    sshCommandTimeoutMs: readNumber(env, 'SSH_COMMAND_TIMEOUT_MS', DEFAULT_CONFIG.sshCommandTimeoutMs),
    port: readNumber(env, 'PORT', DEFAULT_CONFIG.port),
    logLevel: readLogLevel(env),
  };
}
