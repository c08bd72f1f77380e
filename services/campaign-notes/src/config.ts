/**
 * Campaign Notes Configuration
 * Reads the environment (and .env) once; every threshold and timeout is tunable without code changes.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '@lorekeeper/errors';
import type { LogLevel } from '@lorekeeper/logger';
import { logger, parseLogLevel } from './utils/logger';

export interface DeduplicationConfig {
  /** Nearest neighbours requested from the vector index */
  candidateLimit: number;
  /** Hard cap applied to any requested candidate limit */
  maxCandidateLimit: number;
  /** Candidates forwarded to the LLM after score filtering */
  maxLlmCandidates: number;
  /** Similarity at or above which an LLM-confirmed duplicate merges without asking */
  autoMergeThreshold: number;
  /** Similarity floor; candidates below it are never considered */
  ambiguousThreshold: number;
  /** LLM confidence (0-100) required for auto-merge; 100 disables auto-merge */
  llmConfidenceThreshold: number;
  /** LLM confidence below which the verdict is treated as no match */
  llmMinConfidence: number;
  llmModel: string;
  llmMaxRetries: number;
  sessionTtlMs: number;
  sessionSweepIntervalMs: number;
}

export interface TimeoutConfig {
  embeddingMs: number;
  vectorMs: number;
  graphMs: number;
  llmMs: number;
  pipelineMs: number;
}

export interface AppConfig {
  env: string;
  logLevel: LogLevel;
  openai: {
    apiKey: string;
    baseUrl: string;
    embeddingModel: string;
    embeddingDimensions: number;
  };
  langfuse: {
    publicKey?: string;
    secretKey?: string;
    host: string;
  };
  neo4j: {
    uri: string;
    username: string;
    password: string;
    database: string;
  };
  qdrant: {
    url: string;
    apiKey?: string;
  };
  deduplication: DeduplicationConfig;
  timeouts: TimeoutConfig;
}

export const DEFAULT_DEDUPLICATION_CONFIG: DeduplicationConfig = {
  candidateLimit: 10,
  maxCandidateLimit: 100,
  maxLlmCandidates: 5,
  autoMergeThreshold: 0.9,
  ambiguousThreshold: 0.6,
  llmConfidenceThreshold: 95,
  llmMinConfidence: 50,
  llmModel: 'gpt-4o-mini',
  llmMaxRetries: 3,
  sessionTtlMs: 10 * 60 * 1000,
  sessionSweepIntervalMs: 60 * 1000,
};

export const DEFAULT_TIMEOUTS: TimeoutConfig = {
  embeddingMs: 15000,
  vectorMs: 10000,
  graphMs: 10000,
  llmMs: 30000,
  pipelineMs: 60000,
};

type Env = Record<string, string | undefined>;

/**
 * Reads a numeric variable. Missing values use the default silently;
 * malformed or out-of-range values use the default with a warning.
 */
function readNumber(
  env: Env,
  key: string,
  fallback: number,
  bounds: { min: number; max: number; integer?: boolean }
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  let schema = z.coerce.number().min(bounds.min).max(bounds.max);
  if (bounds.integer) {
    schema = schema.int();
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Invalid configuration value, using default', {
      key,
      value: raw,
      default: fallback,
      min: bounds.min,
      max: bounds.max,
    });
    return fallback;
  }
  return parsed.data;
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

function readOptional(env: Env, key: string): string | undefined {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

export function loadDeduplicationConfig(env: Env): DeduplicationConfig {
  const defaults = DEFAULT_DEDUPLICATION_CONFIG;
  const maxCandidateLimit = readNumber(env, 'DEDUP_MAX_CANDIDATE_LIMIT', defaults.maxCandidateLimit, {
    min: 1, max: 1000, integer: true,
  });

  const config: DeduplicationConfig = {
    candidateLimit: readNumber(env, 'DEDUP_CANDIDATE_LIMIT', Math.min(defaults.candidateLimit, maxCandidateLimit), {
      min: 1, max: maxCandidateLimit, integer: true,
    }),
    maxCandidateLimit,
    maxLlmCandidates: readNumber(env, 'DEDUP_MAX_LLM_CANDIDATES', defaults.maxLlmCandidates, {
      min: 1, max: 20, integer: true,
    }),
    autoMergeThreshold: readNumber(env, 'DEDUP_AUTO_MERGE_THRESHOLD', defaults.autoMergeThreshold, { min: 0, max: 1 }),
    ambiguousThreshold: readNumber(env, 'DEDUP_AMBIGUOUS_THRESHOLD', defaults.ambiguousThreshold, { min: 0, max: 1 }),
    llmConfidenceThreshold: readNumber(env, 'DEDUP_LLM_CONFIDENCE_THRESHOLD', defaults.llmConfidenceThreshold, {
      min: 0, max: 100, integer: true,
    }),
    llmMinConfidence: readNumber(env, 'DEDUP_LLM_MIN_CONFIDENCE', defaults.llmMinConfidence, {
      min: 0, max: 100, integer: true,
    }),
    llmModel: readString(env, 'DEDUP_LLM_MODEL', defaults.llmModel),
    llmMaxRetries: readNumber(env, 'DEDUP_LLM_MAX_RETRIES', defaults.llmMaxRetries, { min: 0, max: 10, integer: true }),
    sessionTtlMs: readNumber(env, 'DEDUP_SESSION_TTL_MS', defaults.sessionTtlMs, {
      min: 1000, max: 24 * 60 * 60 * 1000, integer: true,
    }),
    sessionSweepIntervalMs: readNumber(env, 'DEDUP_SESSION_SWEEP_INTERVAL_MS', defaults.sessionSweepIntervalMs, {
      min: 1000, max: 60 * 60 * 1000, integer: true,
    }),
  };

  if (config.ambiguousThreshold > config.autoMergeThreshold) {
    throw new ConfigurationError('DEDUP_AMBIGUOUS_THRESHOLD must not exceed DEDUP_AUTO_MERGE_THRESHOLD', {
      ambiguousThreshold: config.ambiguousThreshold,
      autoMergeThreshold: config.autoMergeThreshold,
    });
  }
  if (config.llmMinConfidence > config.llmConfidenceThreshold) {
    throw new ConfigurationError('DEDUP_LLM_MIN_CONFIDENCE must not exceed DEDUP_LLM_CONFIDENCE_THRESHOLD', {
      llmMinConfidence: config.llmMinConfidence,
      llmConfidenceThreshold: config.llmConfidenceThreshold,
    });
  }

  return config;
}

export function loadTimeouts(env: Env): TimeoutConfig {
  const bounds = { min: 1, max: 10 * 60 * 1000, integer: true };
  return {
    embeddingMs: readNumber(env, 'TIMEOUT_EMBEDDING_MS', DEFAULT_TIMEOUTS.embeddingMs, bounds),
    vectorMs: readNumber(env, 'TIMEOUT_VECTOR_MS', DEFAULT_TIMEOUTS.vectorMs, bounds),
    graphMs: readNumber(env, 'TIMEOUT_GRAPH_MS', DEFAULT_TIMEOUTS.graphMs, bounds),
    llmMs: readNumber(env, 'TIMEOUT_LLM_MS', DEFAULT_TIMEOUTS.llmMs, bounds),
    pipelineMs: readNumber(env, 'TIMEOUT_PIPELINE_MS', DEFAULT_TIMEOUTS.pipelineMs, bounds),
  };
}

/**
 * Load configuration. Without an explicit env the process environment is used,
 * after merging a .env file from the working directory.
 */
export function loadConfig(env?: Env): AppConfig {
  let source: Env;
  if (env) {
    source = env;
  } else {
    dotenv.config();
    source = process.env;
  }

  return {
    env: readString(source, 'NODE_ENV', 'development'),
    logLevel: parseLogLevel(source.LOG_LEVEL),
    openai: {
      apiKey: readString(source, 'OPENAI_API_KEY', ''),
      baseUrl: readString(source, 'OPENAI_BASE_URL', 'https://api.openai.com/v1'),
      embeddingModel: readString(source, 'OPENAI_EMBEDDING_MODEL', 'text-embedding-3-large'),
      embeddingDimensions: readNumber(source, 'OPENAI_EMBEDDING_DIMENSIONS', 3072, { min: 1, max: 8192, integer: true }),
    },
    langfuse: {
      publicKey: readOptional(source, 'LANGFUSE_PUBLIC_KEY'),
      secretKey: readOptional(source, 'LANGFUSE_SECRET_KEY'),
      host: readString(source, 'LANGFUSE_HOST', 'https://cloud.langfuse.com'),
    },
    neo4j: {
      uri: readString(source, 'NEO4J_URI', 'bolt://localhost:7687'),
      username: readString(source, 'NEO4J_USER', 'neo4j'),
      password: readString(source, 'NEO4J_PASSWORD', ''),
      database: readString(source, 'NEO4J_DATABASE', 'neo4j'),
    },
    qdrant: {
      url: readString(source, 'QDRANT_URL', 'http://localhost:6333'),
      apiKey: readOptional(source, 'QDRANT_API_KEY'),
    },
    deduplication: loadDeduplicationConfig(source),
    timeouts: loadTimeouts(source),
  };
}
