import { config } from "dotenv";
import { parseLogLevel } from "./adapters/sys/ConsoleLogger";
import { ConfigurationError } from "./shared/errors";

const cliArgs = process.argv.slice(2);
let envFileArg: string | undefined;
let logFileArg: string | undefined;
let logLevelArg: string | undefined;
let toolTimeoutArg: string | undefined;

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  switch (arg) {
    case "--env-file":
      if (cliArgs[i + 1]) {
        envFileArg = cliArgs[++i];
      }
      break;
    case "--log-file":
      if (cliArgs[i + 1]) {
        logFileArg = cliArgs[++i];
      }
      break;
    case "--log-level":
      if (cliArgs[i + 1]) {
        logLevelArg = cliArgs[++i];
      }
      break;
    case "--tool-timeout":
      if (cliArgs[i + 1]) {
        toolTimeoutArg = cliArgs[++i];
      }
      break;
    default:
      break;
  }
}

// The MCP host launches the server from an arbitrary working directory, so an
// explicit --env-file wins over ./.env.
config(envFileArg ? { path: envFileArg } : undefined);

export const DEFAULT_COLLECTION = "Cook_Engineering_Manual";
export const DEFAULT_COMPLETION_MODEL = "gpt-4o";

export function readInteger(raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}

export const ENV_FILE = envFileArg;
export const LOG_FILE = logFileArg ?? (process.env.LOG_FILE || undefined);
export const LOG_LEVEL = parseLogLevel(logLevelArg ?? process.env.LOG_LEVEL);
export const TOOL_TIMEOUT_MS = readInteger(toolTimeoutArg ?? process.env.TOOL_TIMEOUT_MS, 120_000);

export interface ManualSettings {
  pageCount: number;
  defaultLimit: number;
  maxLimit: number;
}

export function readManualSettings(env: NodeJS.ProcessEnv = process.env): ManualSettings {
  const maxLimit = readInteger(env.SEARCH_MAX_LIMIT, 20, 1);
  return {
    pageCount: readInteger(env.MANUAL_PAGE_COUNT, 150, 1),
    defaultLimit: Math.min(maxLimit, readInteger(env.SEARCH_DEFAULT_LIMIT, 5, 1)),
    maxLimit,
  };
}

export interface VectorSearchConfig {
  url: string;
  apiKey: string;
  collection: string;
  /** Keys Weaviate forwards to its vectorizer and reranker modules. */
  headers: Record<string, string>;
}

function missing(env: NodeJS.ProcessEnv, names: string[]): string[] {
  return names.filter((name) => !env[name]?.trim());
}

/** Read when the search client is constructed, never at startup. */
export function readVectorSearchConfig(env: NodeJS.ProcessEnv = process.env): VectorSearchConfig {
  const absent = missing(env, ["WEAVIATE_URL", "WEAVIATE_API_KEY"]);
  if (absent.length) {
    throw new ConfigurationError(`Missing vector search configuration: ${absent.join(", ")}`);
  }

  const headers: Record<string, string> = {};
  const openAiKey = env.OPENAI_API_KEY?.trim();
  const cohereKey = env.COHERE_KEY?.trim();
  if (openAiKey) headers["X-OpenAI-Api-Key"] = openAiKey;
  if (cohereKey) headers["X-Cohere-Api-Key"] = cohereKey;

  return {
    url: (env.WEAVIATE_URL ?? "").trim(),
    apiKey: (env.WEAVIATE_API_KEY ?? "").trim(),
    collection: env.WEAVIATE_COLLECTION?.trim() || DEFAULT_COLLECTION,
    headers,
  };
}

export interface CompletionConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
}

/** Read when the completion client is constructed, never at startup. */
export function readCompletionConfig(env: NodeJS.ProcessEnv = process.env): CompletionConfig {
  const apiKey = env.OPENAI_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigurationError("Missing completion configuration: OPENAI_API_KEY");
  }
  return {
    apiKey,
    model: env.OPENAI_MODEL?.trim() || DEFAULT_COMPLETION_MODEL,
    maxTokens: readInteger(env.OPENAI_MAX_TOKENS, 1500, 1),
  };
}
