import type { ReadyClients } from "../clients/ClientRegistryPort";
import type { LoggerPort } from "../sys/LoggerPort";

export type ArgumentType = "string" | "integer" | "number" | "boolean";
export type ArgumentValue = string | number | boolean;
export type ToolArguments = Record<string, ArgumentValue>;

export interface ArgumentProperty {
  type: ArgumentType;
  description?: string;
  minimum?: number;
  maximum?: number;
  minLength?: number;
}

export interface ArgumentSchema {
  type: "object";
  properties: Record<string, ArgumentProperty>;
  required?: readonly string[];
  additionalProperties?: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  schema: ArgumentSchema;
}

export interface ToolImage {
  /** Base64 payload without a data: prefix. */
  data: string;
  mimeType: string;
}

export interface ToolPayload {
  message: string;
  data?: Record<string, unknown>;
  images?: ToolImage[];
}

export interface ToolContext {
  signal: AbortSignal;
  log: LoggerPort;
}

export interface ToolHandler<TClients, K extends keyof TClients = keyof TClients>
  extends ToolDefinition {
  readonly requiredSlots: readonly K[];
  exec(
    args: ToolArguments,
    clients: ReadyClients<TClients, K>,
    ctx: ToolContext
  ): Promise<ToolPayload>;
}

export interface ToolCallRequest {
  toolId: string;
  arguments?: unknown;
}

export type ToolFailure =
  | { kind: "UnknownToolError"; toolId: string; message: string }
  | { kind: "InvalidArgumentError"; field: string; reason: string; message: string }
  | { kind: "DependencyUnavailable"; slot: string; cause: string; message: string }
  | { kind: "ToolExecutionError"; message: string }
  | { kind: "ToolCancelledError"; message: string };

export type ToolFailureKind = ToolFailure["kind"];

export type ToolCallResponse = ({ ok: true } & ToolPayload) | { ok: false; error: ToolFailure };

export interface DispatchOptions {
  signal?: AbortSignal;
}

export interface ToolRegistryPort {
  list(): ToolDefinition[];
  dispatch(request: ToolCallRequest, options?: DispatchOptions): Promise<ToolCallResponse>;
}
