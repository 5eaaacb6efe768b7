/**
 * Error codes shared by the client registry, the dispatcher and the
 * configuration readers. Codes are stable; messages are for humans.
 */
export const ErrorCodes = {
  DUPLICATE_SLOT: "DUPLICATE_SLOT",
  UNKNOWN_SLOT: "UNKNOWN_SLOT",
  REGISTRY_SEALED: "REGISTRY_SEALED",
  REGISTRY_CLOSED: "REGISTRY_CLOSED",
  INITIALIZATION_FAILED: "INITIALIZATION_FAILED",
  CONFIGURATION: "CONFIGURATION",
  DUPLICATE_TOOL: "DUPLICATE_TOOL",
  TOOL_EXECUTION: "TOOL_EXECUTION",
  CANCELLED: "CANCELLED",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class ServiceError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.name, code: this.code, message: this.message };
  }
}

export class DuplicateSlotError extends ServiceError {
  constructor(readonly slot: string) {
    super(`Client slot "${slot}" is already declared.`, ErrorCodes.DUPLICATE_SLOT);
  }
}

export class UnknownSlotError extends ServiceError {
  constructor(readonly slot: string) {
    super(`Client slot "${slot}" was never declared.`, ErrorCodes.UNKNOWN_SLOT);
  }
}

export class RegistrySealedError extends ServiceError {
  constructor(readonly slot: string) {
    super(
      `Cannot declare client slot "${slot}" after the registry started serving.`,
      ErrorCodes.REGISTRY_SEALED,
    );
  }
}

export class RegistryClosedError extends ServiceError {
  constructor() {
    super("Client registry is closed.", ErrorCodes.REGISTRY_CLOSED);
  }
}

/** Construction of a client slot failed; the slot is retried on the next call. */
export class InitializationError extends ServiceError {
  readonly causeMessage: string;

  constructor(readonly slot: string, cause: unknown) {
    const causeMessage = describeError(cause);
    super(`Failed to initialize "${slot}": ${causeMessage}`, ErrorCodes.INITIALIZATION_FAILED, {
      cause,
    });
    this.causeMessage = causeMessage;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), slot: this.slot, cause: this.causeMessage };
  }
}

export class ConfigurationError extends ServiceError {
  constructor(message: string) {
    super(message, ErrorCodes.CONFIGURATION);
  }
}

export class DuplicateToolError extends ServiceError {
  constructor(readonly toolId: string) {
    super(`Tool "${toolId}" is already registered.`, ErrorCodes.DUPLICATE_TOOL);
  }
}

/** Thrown by tool handlers for domain failures the caller should see verbatim. */
export class ToolExecutionError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCodes.TOOL_EXECUTION, options);
  }
}

export class OperationCancelledError extends ServiceError {
  constructor(message = "Operation was cancelled.") {
    super(message, ErrorCodes.CANCELLED);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
