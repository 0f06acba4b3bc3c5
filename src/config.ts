import "dotenv/config";
import { readFileSync } from "fs";
import { join } from "path";

import { parseProfile } from "./engine/profiles.js";
import { createLogger } from "./logging/configLogger.js";

import type { ExtractionProfile, LeftoverPolicy, QueueStrategy } from "./types/index.js";

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

interface PairStreamConfig {
  server: {
    defaultHost: string;
    defaultPort: string;
    defaultDebugMode: boolean;
  };
  engine: {
    profile: string;
    queueStrategy: QueueStrategy;
    maxPairs: number;
    firstSeriesCapacity?: number;
    secondSeriesCapacity?: number;
    growthLimit: number;
    leftoverPolicy: LeftoverPolicy;
  };
  performance: {
    maxTextLength: number;
    outputBufferSize: number;
  };
}

interface ConfigFile extends DeepPartial<PairStreamConfig> {
  profiles?: unknown[];
}

const DEFAULT_CONFIG: PairStreamConfig = {
  server: {
    defaultHost: "0.0.0.0",
    defaultPort: "3200",
    defaultDebugMode: false,
  },
  engine: {
    profile: "traffic",
    queueStrategy: "bounded",
    maxPairs: 64, // unmatched values held per series
    growthLimit: 16 * 1024 * 1024, // slots a growable queue may reach
    leftoverPolicy: "discard",
  },
  performance: {
    maxTextLength: 512, // site ids, dates and side-channel lines
    outputBufferSize: 64 * 1024,
  },
};

function getEnv(key: string): string | undefined {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

function loadConfigFromFile(): ConfigFile {
  try {
    const configPath = join(process.cwd(), "config.json");
    const configFile = readFileSync(configPath, "utf8");
    return JSON.parse(configFile) as ConfigFile;
  } catch (error: unknown) {
    // Can't use logger here as it's not created yet
    console.warn(`[CONFIG] Unable to load config.json (${error instanceof Error ? error.message : "Unknown error"}). Using defaults.`);
    return {};
  }
}

const fileConfig = loadConfigFromFile();

// Create logger using debug mode from config.json (SSOT)
const envDebug = getEnv("DEBUG_MODE");
const debugMode = envDebug !== undefined
  ? envDebug === "true"
  : fileConfig.server?.defaultDebugMode ?? DEFAULT_CONFIG.server.defaultDebugMode;
const logger = createLogger(debugMode);

const engineFile = fileConfig.engine;

export const config: PairStreamConfig = {
  server: {
    defaultHost: fileConfig.server?.defaultHost ?? DEFAULT_CONFIG.server.defaultHost,
    defaultPort: fileConfig.server?.defaultPort ?? DEFAULT_CONFIG.server.defaultPort,
    defaultDebugMode: debugMode,
  },
  engine: {
    profile: engineFile?.profile ?? DEFAULT_CONFIG.engine.profile,
    queueStrategy: engineFile?.queueStrategy ?? DEFAULT_CONFIG.engine.queueStrategy,
    maxPairs: engineFile?.maxPairs ?? DEFAULT_CONFIG.engine.maxPairs,
    growthLimit: engineFile?.growthLimit ?? DEFAULT_CONFIG.engine.growthLimit,
    leftoverPolicy: engineFile?.leftoverPolicy ?? DEFAULT_CONFIG.engine.leftoverPolicy,
  },
  performance: {
    maxTextLength:
      fileConfig.performance?.maxTextLength ?? DEFAULT_CONFIG.performance.maxTextLength,
    outputBufferSize:
      fileConfig.performance?.outputBufferSize ?? DEFAULT_CONFIG.performance.outputBufferSize,
  },
};

if (engineFile?.firstSeriesCapacity !== undefined) {
  config.engine.firstSeriesCapacity = engineFile.firstSeriesCapacity;
}
if (engineFile?.secondSeriesCapacity !== undefined) {
  config.engine.secondSeriesCapacity = engineFile.secondSeriesCapacity;
}

// ============================================================================
// ENGINE CONFIGURATION (SSOT: config.json, env overrides for deployments)
// ============================================================================

export const DEFAULT_PROFILE = getEnv("PAIRSTREAM_PROFILE") ?? config.engine.profile;
export const QUEUE_STRATEGY = (getEnv("PAIRSTREAM_QUEUE_STRATEGY") ?? config.engine.queueStrategy).toLowerCase();
export const MAX_PAIRS = config.engine.maxPairs;
export const FIRST_SERIES_CAPACITY = config.engine.firstSeriesCapacity ?? MAX_PAIRS;
export const SECOND_SERIES_CAPACITY = config.engine.secondSeriesCapacity ?? MAX_PAIRS;
export const GROWTH_LIMIT = config.engine.growthLimit;
export const LEFTOVER_POLICY: string = config.engine.leftoverPolicy;

// ============================================================================
// PERFORMANCE CONFIGURATION (from config.json)
// ============================================================================

export const MAX_TEXT_LENGTH = config.performance.maxTextLength;
export const OUTPUT_BUFFER_SIZE = config.performance.outputBufferSize;

// ============================================================================
// SERVER CONFIGURATION (from config.json)
// ============================================================================

export const SERVER_HOST = config.server.defaultHost;
export const SERVER_PORT = Number(getEnv("PAIRSTREAM_PORT") ?? config.server.defaultPort);
export const DEBUG_MODE = config.server.defaultDebugMode;

// ============================================================================
// PROFILES (built-ins plus config.json extras)
// ============================================================================

function loadCustomProfiles(): { profiles: ExtractionProfile[]; errors: string[] } {
  const profiles: ExtractionProfile[] = [];
  const errors: string[] = [];
  for (const raw of fileConfig.profiles ?? []) {
    try {
      profiles.push(parseProfile(raw));
    } catch (error: unknown) {
      errors.push(error instanceof Error ? error.message : String(error));
    }
  }
  return { profiles, errors };
}

const customProfiles = loadCustomProfiles();

export const CUSTOM_PROFILES: readonly ExtractionProfile[] = customProfiles.profiles;

export function isQueueStrategy(value: string): value is QueueStrategy {
  return value === "bounded" || value === "unbounded";
}

export function isLeftoverPolicy(value: string): value is LeftoverPolicy {
  return value === "discard" || value === "report";
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function validateConfig(): void {
  const errors: string[] = [...customProfiles.errors];

  if (!isQueueStrategy(QUEUE_STRATEGY)) {
    errors.push(`queueStrategy must be one of: bounded, unbounded. Got: ${QUEUE_STRATEGY}`);
  }

  if (!isLeftoverPolicy(LEFTOVER_POLICY)) {
    errors.push(`leftoverPolicy must be one of: discard, report. Got: ${LEFTOVER_POLICY}`);
  }

  for (const [name, value] of [
    ["maxPairs", MAX_PAIRS],
    ["firstSeriesCapacity", FIRST_SERIES_CAPACITY],
    ["secondSeriesCapacity", SECOND_SERIES_CAPACITY],
    ["growthLimit", GROWTH_LIMIT],
    ["maxTextLength", MAX_TEXT_LENGTH],
    ["outputBufferSize", OUTPUT_BUFFER_SIZE],
  ] as const) {
    if (!isPositiveInteger(value)) {
      errors.push(`${name} must be a positive integer. Got: ${value}`);
    }
  }

  if (Number.isNaN(SERVER_PORT) || SERVER_PORT < 1 || SERVER_PORT > 65_535) {
    errors.push("PAIRSTREAM_PORT must be a valid port number between 1 and 65535");
  }

  if (errors.length > 0) {
    const errorMessage = `Configuration validation failed:\n${errors.map((error) => `- ${error}`).join("\n")}`;
    logger.error(errorMessage);
    throw new Error(errorMessage);
  }

  logger.debug("PairStream configuration (SSOT: config.json):");
  logger.debug(`  Profile: ${DEFAULT_PROFILE}`);
  logger.debug(`  Queue strategy: ${QUEUE_STRATEGY} (capacity ${FIRST_SERIES_CAPACITY}/${SECOND_SERIES_CAPACITY})`);
  logger.debug(`  Leftover policy: ${LEFTOVER_POLICY}`);
  logger.debug(`  Max text length: ${MAX_TEXT_LENGTH}`);
}
