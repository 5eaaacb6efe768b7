import type { SlotSnapshot } from "../../ports/clients/ClientRegistryPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { InitializationError } from "../../shared/errors";

export type SlotConstructor<T> = () => T | Promise<T>;

export interface SlotOptions<T> {
  /** Releases a ready handle when the registry closes. */
  dispose?: (handle: T) => void | Promise<void>;
}

type SlotState<T> =
  | { status: "uninitialized" }
  | { status: "initializing"; pending: Promise<T> }
  | { status: "ready"; handle: T; readyAt: Date }
  | { status: "failed"; error: InitializationError; failedAt: Date };

/**
 * One named external client and its construction state machine.
 *
 *   uninitialized -> initializing -> ready
 *                         |
 *                         v
 *                      failed -> initializing (next acquire)
 *
 * The in-flight promise is stored before the constructor runs, so every
 * caller arriving while construction is pending joins the same attempt and
 * observes the same outcome.
 */
export class ClientSlot<T> {
  private state: SlotState<T> = { status: "uninitialized" };
  private attempts = 0;

  constructor(
    readonly name: string,
    private readonly construct: SlotConstructor<T>,
    private readonly log: LoggerPort,
    private readonly options: SlotOptions<T> = {}
  ) {}

  peek(): T | undefined {
    return this.state.status === "ready" ? this.state.handle : undefined;
  }

  acquire(): Promise<T> {
    switch (this.state.status) {
      case "ready":
        return Promise.resolve(this.state.handle);
      case "initializing":
        return this.state.pending;
      default:
        return this.start();
    }
  }

  snapshot(): SlotSnapshot {
    const snapshot: SlotSnapshot = {
      name: this.name,
      status: this.state.status,
      attempts: this.attempts,
    };
    if (this.state.status === "ready") {
      snapshot.readyAt = this.state.readyAt.toISOString();
    }
    if (this.state.status === "failed") {
      snapshot.lastError = this.state.error.causeMessage;
      snapshot.failedAt = this.state.failedAt.toISOString();
    }
    return snapshot;
  }

  /** Waits for any pending attempt, then disposes the handle and resets the slot. */
  async release(): Promise<void> {
    if (this.state.status === "initializing") {
      await Promise.allSettled([this.state.pending]);
    }
    if (this.state.status !== "ready") return;

    const { handle } = this.state;
    this.state = { status: "uninitialized" };
    await this.options.dispose?.(handle);
  }

  private start(): Promise<T> {
    this.attempts += 1;
    const attempt = this.attempts;
    const startedAt = Date.now();
    this.log.info("Connecting client", { slot: this.name, attempt });

    const pending = Promise.resolve()
      .then(() => this.construct())
      .then((handle) => {
        if (handle === undefined || handle === null) {
          throw new Error("Constructor resolved without a client.");
        }
        return handle;
      })
      .then(
        (handle) => {
          this.state = { status: "ready", handle, readyAt: new Date() };
          this.log.info("Client ready", {
            slot: this.name,
            attempt,
            durationMs: Date.now() - startedAt,
          });
          return handle;
        },
        (cause: unknown) => {
          const error = new InitializationError(this.name, cause);
          this.state = { status: "failed", error, failedAt: new Date() };
          this.log.warn("Client initialization failed", {
            slot: this.name,
            attempt,
            error: error.causeMessage,
          });
          throw error;
        }
      );

    this.state = { status: "initializing", pending };
    return pending;
  }
}
