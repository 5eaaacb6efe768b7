import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  TOOL_TIMEOUT_MS,
  readCompletionConfig,
  readManualSettings,
  readVectorSearchConfig,
} from '../env';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { WeaviateManualSearch } from '../adapters/search/WeaviateManualSearch';
import { OpenAiCompletion } from '../adapters/completion/OpenAiCompletion';
import { McpToolServer } from '../adapters/mcp/McpToolServer';
import { LazyClientRegistry } from '../domain/clients/LazyClientRegistry';
import { ToolDispatcher } from '../app/ToolDispatcher';
import { SearchManualTool } from '../features/ManualTools/SearchManualTool';
import { GetPageTool } from '../features/ManualTools/GetPageTool';
import { ServiceStatusTool } from '../features/StatusTools/ServiceStatusTool';
import type { LoggerPort } from '../ports/sys/LoggerPort';
import { COMPLETION_SLOT, SEARCH_SLOT, type ServiceClients, type ServiceSlot } from '../shared/contracts';
import { describeError } from '../shared/errors';

export const SERVER_IDENTITY = { name: 'handbook-mcp-server', version: '1.0.0' };

/** Runs each slot's configuration reader without constructing anything. */
export function checkConfiguration(env: NodeJS.ProcessEnv): Partial<Record<ServiceSlot, string>> {
  const readers: Record<ServiceSlot, () => unknown> = {
    [SEARCH_SLOT]: () => readVectorSearchConfig(env),
    [COMPLETION_SLOT]: () => readCompletionConfig(env),
  };
  const issues: Partial<Record<ServiceSlot, string>> = {};
  for (const slot of [SEARCH_SLOT, COMPLETION_SLOT] as const) {
    try {
      readers[slot]();
    } catch (err) {
      issues[slot] = describeError(err);
    }
  }
  return issues;
}

export interface ApplicationOptions {
  logger?: LoggerPort;
  env?: NodeJS.ProcessEnv;
  /** Defaults to stdio. */
  transport?: Transport;
  timeoutMs?: number;
}

export interface ApplicationInstance {
  readonly registry: LazyClientRegistry<ServiceClients>;
  readonly tools: ToolDispatcher<ServiceClients>;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Wires the registry, tools and MCP server. Building performs no network I/O
 * and reads no backend credentials; those are read when a slot first connects.
 */
export function buildApplication(options: ApplicationOptions = {}): ApplicationInstance {
  const log = options.logger ?? new ConsoleLogger();
  const env = options.env ?? process.env;
  const settings = readManualSettings(env);

  const registry = new LazyClientRegistry<ServiceClients>(log)
    .declare(SEARCH_SLOT, () => WeaviateManualSearch.connect(readVectorSearchConfig(env)), {
      dispose: (search) => search.close(),
    })
    .declare(COMPLETION_SLOT, () => new OpenAiCompletion(readCompletionConfig(env)));

  const tools = new ToolDispatcher(registry, log, { timeoutMs: options.timeoutMs ?? TOOL_TIMEOUT_MS })
    .register(new SearchManualTool(settings))
    .register(new GetPageTool(settings.pageCount))
    .register(new ServiceStatusTool(registry, () => checkConfiguration(env)));

  const server = new McpToolServer(tools, log, SERVER_IDENTITY);

  let started = false;
  let stopped: Promise<void> | undefined;

  return {
    registry,
    tools,
    start: async () => {
      if (started) return;
      started = true;
      await server.connect(options.transport ?? new StdioServerTransport());
      log.info('Handbook MCP server ready', {
        tools: tools.list().map((tool) => tool.name),
        pages: settings.pageCount,
      });
    },
    shutdown: () => {
      if (!stopped) {
        stopped = (async () => {
          log.info('Shutting down');
          try {
            await server.close();
          } finally {
            await registry.close();
          }
        })();
      }
      return stopped;
    },
  };
}
