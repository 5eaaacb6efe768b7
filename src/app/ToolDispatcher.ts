import type { ClientRegistryPort } from "../ports/clients/ClientRegistryPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type {
  DispatchOptions,
  ToolArguments,
  ToolCallRequest,
  ToolCallResponse,
  ToolContext,
  ToolDefinition,
  ToolFailure,
  ToolHandler,
  ToolPayload,
  ToolRegistryPort,
} from "../ports/tools/ToolRegistryPort";
import { validateArguments } from "../domain/tools/validateArguments";
import { createCallScope, withAbort } from "../runtime/cancellation";
import {
  DuplicateToolError,
  InitializationError,
  OperationCancelledError,
  describeError,
} from "../shared/errors";

type BoundRun = (args: ToolArguments, ctx: ToolContext) => Promise<ToolPayload>;

interface RegisteredTool {
  definition: ToolDefinition;
  /** Acquires the handler's clients and returns the handler bound to them. */
  prepare(signal: AbortSignal): Promise<BoundRun>;
}

export interface ToolDispatcherOptions {
  /** Upper bound for one call, client construction included. 0 disables it. */
  timeoutMs?: number;
}

function failure(error: ToolFailure): ToolCallResponse {
  return { ok: false, error };
}

function cancelledOrExecutionFailure(err: unknown): ToolCallResponse {
  if (err instanceof OperationCancelledError) {
    return failure({ kind: "ToolCancelledError", message: err.message });
  }
  return failure({ kind: "ToolExecutionError", message: describeError(err) });
}

export class ToolDispatcher<TClients> implements ToolRegistryPort {
  private readonly toolsByName = new Map<string, RegisteredTool>();
  private readonly timeoutMs: number;

  constructor(
    private readonly registry: ClientRegistryPort<TClients>,
    private readonly log: LoggerPort,
    options: ToolDispatcherOptions = {}
  ) {
    this.timeoutMs = Math.max(0, options.timeoutMs ?? 0);
  }

  register<K extends keyof TClients & string>(handler: ToolHandler<TClients, K>): this {
    if (this.toolsByName.has(handler.name)) {
      throw new DuplicateToolError(handler.name);
    }

    this.toolsByName.set(handler.name, {
      definition: {
        name: handler.name,
        description: handler.description,
        schema: handler.schema,
      },
      prepare: async (signal) => {
        const clients = await this.registry.ensureReady(handler.requiredSlots, { signal });
        return (args, ctx) => handler.exec(args, clients, ctx);
      },
    });
    return this;
  }

  list(): ToolDefinition[] {
    return Array.from(this.toolsByName.values()).map((tool) => tool.definition);
  }

  async dispatch(request: ToolCallRequest, options: DispatchOptions = {}): Promise<ToolCallResponse> {
    const startedAt = Date.now();
    let response: ToolCallResponse;
    try {
      response = await this.route(request, options);
    } catch (err) {
      this.log.error("Tool dispatch failed unexpectedly", {
        tool: request.toolId,
        error: describeError(err),
      });
      response = failure({ kind: "ToolExecutionError", message: describeError(err) });
    }

    const meta = { tool: request.toolId, durationMs: Date.now() - startedAt };
    if (response.ok) {
      this.log.info("Tool call succeeded", meta);
    } else {
      this.log.warn("Tool call failed", { ...meta, kind: response.error.kind, message: response.error.message });
    }
    return response;
  }

  private async route(request: ToolCallRequest, options: DispatchOptions): Promise<ToolCallResponse> {
    const tool = this.toolsByName.get(request.toolId);
    if (!tool) {
      return failure({
        kind: "UnknownToolError",
        toolId: request.toolId,
        message: `Unknown tool "${request.toolId}". Known tools: ${Array.from(this.toolsByName.keys()).join(", ")}`,
      });
    }

    const validation = validateArguments(tool.definition.schema, request.arguments);
    if (!validation.ok) {
      return failure({
        kind: "InvalidArgumentError",
        field: validation.field,
        reason: validation.reason,
        message: `Invalid argument "${validation.field}": ${validation.reason}`,
      });
    }

    const scope = createCallScope(options.signal, this.timeoutMs);
    try {
      let run: BoundRun;
      try {
        run = await tool.prepare(scope.signal);
      } catch (err) {
        if (err instanceof InitializationError) {
          return failure({
            kind: "DependencyUnavailable",
            slot: err.slot,
            cause: err.causeMessage,
            message: `Dependency "${err.slot}" is unavailable: ${err.causeMessage}`,
          });
        }
        return cancelledOrExecutionFailure(err);
      }

      try {
        const payload = await withAbort(
          run(validation.value, { signal: scope.signal, log: this.log }),
          scope.signal
        );
        return { ok: true, ...payload };
      } catch (err) {
        return cancelledOrExecutionFailure(err);
      }
    } finally {
      scope.dispose();
    }
  }
}
