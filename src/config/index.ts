// src/config/index.ts
import dotenv from 'dotenv';
import path from 'path';
import { ConfigurationError } from '../errors';
import { createLogger } from '../utils/logger';
import { ModelChoice, isModelChoice } from '../services/llm/models';

const logger = createLogger('config');

export type SessionBackend = 'file' | 'redis';

export interface ConfidenceConfig {
  /** Weight of the retrieval signal in the blend. */
  retrievalWeight: number;
  /** Weight of the model self-rating in the blend. */
  selfWeight: number;
  /** How many of the best retrieval results are averaged. */
  topK: number;
  /** Ceiling applied when the answer has no retrieved grounding. */
  ungroundedCeiling: number;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  groqApiKey: string;
  openAiApiKey: string;
  tavilyApiKey: string | null;
  defaultModel: ModelChoice;
  routerModel: ModelChoice;
  summaryModel: ModelChoice;
  modelTimeoutMs: number;
  chroma: {
    url: string;
    collection: string;
    embeddingModel: string;
    topK: number;
  };
  retrieval: {
    tokenBudget: number;
    relevanceFloor: number;
    trustedDomains: readonly string[];
    timeoutMs: number;
    maxWebResults: number;
  };
  session: {
    backend: SessionBackend;
    dir: string;
    redisUrl: string;
    historyTokenBudget: number;
    keepRecentTurns: number;
  };
  routing: {
    floor: number;
    shiftThreshold: number;
  };
  collaboration: {
    threshold: number;
    timeoutMs: number;
  };
  confidence: ConfidenceConfig;
}

export const DEFAULT_TRUSTED_DOMAINS: readonly string[] = [
  'nist.gov',
  'cisa.gov',
  'sans.org',
  'mitre.org',
  'owasp.org',
  'cisecurity.org',
  'us-cert.gov',
  'first.org',
  'enisa.europa.eu',
];

type Env = Record<string, string | undefined>;

// Helper to get environment variables with defaults and critical checks
export const getEnvVar = (env: Env, key: string, defaultValue?: string, isCritical: boolean = false): string => {
  const value = env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      logger.debug(`Environment variable ${key} is not set, using default`, { key, defaultValue });
      return defaultValue;
    }
    if (isCritical) {
      throw new ConfigurationError(`Environment variable ${key} is missing or empty and has no default. This is required.`, { key });
    }
    return '';
  }
  return value;
};

const getNumber = (env: Env, key: string, defaultValue: number): number => {
  const raw = getEnvVar(env, key, String(defaultValue));
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number, got '${raw}'`, { key });
  }
  return parsed;
};

const getUnitInterval = (env: Env, key: string, defaultValue: number): number => {
  const value = getNumber(env, key, defaultValue);
  if (value < 0 || value > 1) {
    throw new ConfigurationError(`Environment variable ${key} must be between 0 and 1, got ${value}`, { key });
  }
  return value;
};

const getModel = (env: Env, key: string, defaultValue: ModelChoice): ModelChoice => {
  const value = getEnvVar(env, key, defaultValue);
  if (!isModelChoice(value)) {
    throw new ConfigurationError(`Environment variable ${key} names an unknown model '${value}'`, { key });
  }
  return value;
};

const getBackend = (env: Env): SessionBackend => {
  const value = getEnvVar(env, 'SESSION_BACKEND', 'file');
  if (value !== 'file' && value !== 'redis') {
    throw new ConfigurationError(`SESSION_BACKEND must be 'file' or 'redis', got '${value}'`, { key: 'SESSION_BACKEND' });
  }
  return value;
};

/**
 * Loads the project-root .env into process.env. Variables already set win.
 */
export function loadEnvFile(): void {
  const projectRootEnvPath = path.resolve(__dirname, '../../.env');
  const dotenvResult = dotenv.config({ path: projectRootEnvPath });
  if (dotenvResult.error) {
    logger.warn('No .env file loaded; relying on the process environment', { path: projectRootEnvPath });
  }
}

/**
 * Builds the immutable configuration object. Throws ConfigurationError when a
 * required credential is missing or a value is malformed.
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const trustedDomains = getEnvVar(env, 'TRUSTED_DOMAINS', '')
    .split(',')
    .map((domain) => domain.trim().toLowerCase())
    .filter((domain) => domain.length > 0);

  const config: AppConfig = {
    nodeEnv: getEnvVar(env, 'NODE_ENV', 'development'),
    port: getNumber(env, 'PORT', 8080),
    groqApiKey: getEnvVar(env, 'GROQ_API_KEY', undefined, true),
    openAiApiKey: getEnvVar(env, 'OPENAI_API_KEY', undefined, true),
    tavilyApiKey: getEnvVar(env, 'TAVILY_API_KEY') || null,
    defaultModel: getModel(env, 'DEFAULT_MODEL', 'openai_mini'),
    routerModel: getModel(env, 'ROUTER_MODEL', 'groq_llama'),
    summaryModel: getModel(env, 'SUMMARY_MODEL', 'openai_mini'),
    modelTimeoutMs: getNumber(env, 'MODEL_TIMEOUT_MS', 30000),
    chroma: {
      url: getEnvVar(env, 'CHROMA_URL', 'http://localhost:8000'),
      collection: getEnvVar(env, 'CHROMA_COLLECTION', 'cybersecurity_knowledge'),
      embeddingModel: getEnvVar(env, 'EMBEDDING_MODEL', 'text-embedding-3-small'),
      topK: getNumber(env, 'KNOWLEDGE_TOP_K', 5),
    },
    retrieval: {
      tokenBudget: getNumber(env, 'RETRIEVAL_TOKEN_BUDGET', 3000),
      relevanceFloor: getUnitInterval(env, 'RETRIEVAL_RELEVANCE_FLOOR', 0.35),
      trustedDomains: trustedDomains.length > 0 ? trustedDomains : DEFAULT_TRUSTED_DOMAINS,
      timeoutMs: getNumber(env, 'RETRIEVAL_TIMEOUT_MS', 10000),
      maxWebResults: getNumber(env, 'MAX_WEB_RESULTS', 4),
    },
    session: {
      backend: getBackend(env),
      dir: getEnvVar(env, 'SESSION_DIR', '.data/conversations'),
      redisUrl: getEnvVar(env, 'REDIS_URL', 'redis://localhost:6379'),
      historyTokenBudget: getNumber(env, 'HISTORY_TOKEN_BUDGET', 2000),
      keepRecentTurns: getNumber(env, 'KEEP_RECENT_TURNS', 4),
    },
    routing: {
      floor: getUnitInterval(env, 'ROUTING_FLOOR', 0.4),
      shiftThreshold: getUnitInterval(env, 'ROUTING_SHIFT_THRESHOLD', 0.75),
    },
    collaboration: {
      threshold: getUnitInterval(env, 'COLLABORATION_THRESHOLD', 0.6),
      timeoutMs: getNumber(env, 'COLLABORATION_TIMEOUT_MS', 45000),
    },
    confidence: {
      retrievalWeight: getNumber(env, 'CONFIDENCE_RETRIEVAL_WEIGHT', 0.6),
      selfWeight: getNumber(env, 'CONFIDENCE_SELF_WEIGHT', 0.4),
      topK: getNumber(env, 'CONFIDENCE_TOP_K', 3),
      ungroundedCeiling: getUnitInterval(env, 'UNGROUNDED_CONFIDENCE_CEILING', 0.5),
    },
  };

  if (config.confidence.retrievalWeight < 0 || config.confidence.selfWeight < 0
    || config.confidence.retrievalWeight + config.confidence.selfWeight === 0) {
    throw new ConfigurationError('Confidence weights must be non-negative and not both zero');
  }

  logger.info('Configuration loaded', {
    nodeEnv: config.nodeEnv,
    sessionBackend: config.session.backend,
    defaultModel: config.defaultModel,
    webSearch: config.tavilyApiKey !== null,
  });

  return Object.freeze(config);
}
