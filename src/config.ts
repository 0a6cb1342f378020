import "dotenv/config";
import { readFileSync } from "fs";
import { join } from "path";

import { createLogger } from "./logging/configLogger.js";

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export interface ProxyConfig {
  readonly backend: {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly modelName: string;
    readonly maxOutputTokens: number;
    readonly providerName: string;
  };
  readonly server: {
    readonly host: string;
    readonly port: number;
    readonly debug: boolean;
  };
  readonly performance: {
    readonly connectionTimeout: number;
  };
}

type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: ProxyConfig = {
  backend: {
    apiKey: "",
    baseUrl: "https://api.groq.com/openai/v1",
    modelName: "moonshotai/kimi-k2-instruct",
    maxOutputTokens: 16_384,
    providerName: "custom",
  },
  server: {
    host: "localhost",
    port: 7187,
    debug: false,
  },
  performance: {
    connectionTimeout: 120_000,
  },
};

export const PLACEHOLDER_API_KEY = "YOUR_API_KEY_HERE";

export class ConfigurationError extends Error {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Configuration validation failed:\n${problems.map((problem) => `- ${problem}`).join("\n")}`);
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}

function getEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return ["true", "1", "yes"].includes(value.toLowerCase());
}

// Non-numeric input becomes NaN, which validateConfig reports
function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  return /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : Number.NaN;
}

function loadConfigFromFile(): DeepPartial<ProxyConfig> {
  const configPath = join(process.cwd(), "config.json");
  try {
    const configFile = readFileSync(configPath, "utf8");
    return JSON.parse(configFile) as DeepPartial<ProxyConfig>;
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    // Can't use logger here as it's not created yet
    console.warn(`[CONFIG] Unable to load config.json (${error instanceof Error ? error.message : "Unknown error"}). Using defaults.`);
    return {};
  }
}

/**
 * Map a backend base URL to a short provider label for logs and the
 * response `model` field.
 */
export function inferProviderName(baseUrl: string): string {
  const base = baseUrl.toLowerCase();
  if (base.includes("groq.com")) {return "groq";}
  if (base.includes("openai.com")) {return "openai";}
  if (base.includes("openrouter.ai")) {return "openrouter";}
  if (base.includes("ollama")) {return "ollama";}
  if (base.includes("anthropic.com") || base.includes("claude")) {return "anthropic";}
  if (base.includes("novita")) {return "novita";}
  if (base.includes("baseten")) {return "baseten";}
  return "custom";
}

const fileConfig = loadConfigFromFile();

// Debug mode - env wins over config.json
export const DEBUG_MODE =
  parseFlag(getEnv(process.env, "DEBUG"))
  ?? fileConfig.server?.debug
  ?? DEFAULT_CONFIG.server.debug;

const logger = createLogger(DEBUG_MODE);

/**
 * Layer defaults, config.json and the environment into one frozen value.
 * Environment variables win; secrets only ever come from the environment.
 */
export function resolveConfig(
  env: Env = process.env,
  file: DeepPartial<ProxyConfig> = fileConfig,
): ProxyConfig {
  const baseUrl = (getEnv(env, "BASE_URL") ?? file.backend?.baseUrl ?? DEFAULT_CONFIG.backend.baseUrl).trim();

  const resolved: ProxyConfig = {
    backend: {
      apiKey: getEnv(env, "API_KEY") ?? "",
      baseUrl,
      modelName: getEnv(env, "MODEL_NAME") ?? file.backend?.modelName ?? DEFAULT_CONFIG.backend.modelName,
      maxOutputTokens:
        parseInteger(getEnv(env, "MAX_OUTPUT_TOKENS"))
        ?? file.backend?.maxOutputTokens
        ?? DEFAULT_CONFIG.backend.maxOutputTokens,
      providerName: (getEnv(env, "PROVIDER_NAME") ?? file.backend?.providerName ?? inferProviderName(baseUrl)).toLowerCase(),
    },
    server: {
      host: getEnv(env, "PROXY_HOST") ?? file.server?.host ?? DEFAULT_CONFIG.server.host,
      port: parseInteger(getEnv(env, "PROXY_PORT")) ?? file.server?.port ?? DEFAULT_CONFIG.server.port,
      debug: parseFlag(getEnv(env, "DEBUG")) ?? file.server?.debug ?? DEFAULT_CONFIG.server.debug,
    },
    performance: {
      connectionTimeout:
        file.performance?.connectionTimeout ?? DEFAULT_CONFIG.performance.connectionTimeout,
    },
  };

  return Object.freeze({
    backend: Object.freeze(resolved.backend),
    server: Object.freeze(resolved.server),
    performance: Object.freeze(resolved.performance),
  });
}

export function validateConfig(config: ProxyConfig): void {
  const errors: string[] = [];

  if (config.backend.apiKey === "" || config.backend.apiKey === PLACEHOLDER_API_KEY) {
    errors.push("API key is required. Set API_KEY environment variable.");
  }

  if (config.backend.baseUrl === "") {
    errors.push("Base URL is required. Set BASE_URL environment variable.");
  } else if (!/^https?:\/\//i.test(config.backend.baseUrl)) {
    errors.push(`BASE_URL must be an http(s) URL. Got: ${config.backend.baseUrl}`);
  }

  if (!Number.isInteger(config.backend.maxOutputTokens) || config.backend.maxOutputTokens < 1) {
    errors.push("MAX_OUTPUT_TOKENS must be a positive integer");
  }

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65_535) {
    errors.push("PROXY_PORT must be a valid port number between 1 and 65535");
  }

  if (!Number.isInteger(config.performance.connectionTimeout) || config.performance.connectionTimeout < 1) {
    errors.push("performance.connectionTimeout must be a positive number of milliseconds");
  }

  if (errors.length > 0) {
    const configError = new ConfigurationError(errors);
    logger.error(configError.message);
    throw configError;
  }

  logger.debug("Bridge Configuration:");
  logger.debug(`  Provider: ${config.backend.providerName}`);
  logger.debug(`  Backend URL: ${config.backend.baseUrl}`);
  logger.debug(`  Model: ${config.backend.modelName}`);
  logger.debug(`  Max Output Tokens: ${config.backend.maxOutputTokens}`);
  logger.debug(`  Proxy: ${config.server.host}:${config.server.port}`);
}

/**
 * Capture the process configuration once. Everything downstream receives
 * the returned value; nothing else reads the environment.
 */
export function loadConfig(): ProxyConfig {
  const config = resolveConfig();
  validateConfig(config);
  return config;
}
