import type {
  ClientRegistryPort,
  EnsureReadyOptions,
  ReadyClients,
  SlotSnapshot,
} from "../../ports/clients/ClientRegistryPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { withAbort } from "../../runtime/cancellation";
import {
  DuplicateSlotError,
  RegistryClosedError,
  RegistrySealedError,
  UnknownSlotError,
  describeError,
} from "../../shared/errors";
import { ClientSlot, type SlotConstructor, type SlotOptions } from "./ClientSlot";

type SlotMap<TClients> = { [K in keyof TClients]?: ClientSlot<TClients[K]> };

interface ManagedSlot {
  readonly name: string;
  snapshot(): SlotSnapshot;
  release(): Promise<void>;
}

/**
 * Owns the external clients of the process. Nothing is constructed until a
 * tool asks for it through `ensureReady`; declaring a slot performs no I/O
 * and reads no configuration.
 */
export class LazyClientRegistry<TClients> implements ClientRegistryPort<TClients> {
  /** Typed handles by slot name; only read for names present in `declared`. */
  private readonly slots: SlotMap<TClients> = {};
  private readonly declared = new Map<string, ManagedSlot>();
  private serving = false;
  private closed = false;

  constructor(private readonly log: LoggerPort) {}

  declare<K extends keyof TClients & string>(
    name: K,
    construct: SlotConstructor<TClients[K]>,
    options?: SlotOptions<TClients[K]>
  ): this {
    if (this.declared.has(name)) throw new DuplicateSlotError(name);
    if (this.serving || this.closed) throw new RegistrySealedError(name);

    const slot = new ClientSlot(name, construct, this.log, options);
    // defineProperty keeps names like "__proto__" as ordinary own keys.
    Object.defineProperty(this.slots, name, { value: slot, enumerable: true });
    this.declared.set(name, slot);
    return this;
  }

  async ensureReady<K extends keyof TClients & string>(
    names: readonly K[],
    options: EnsureReadyOptions = {}
  ): Promise<ReadyClients<TClients, K>> {
    if (this.closed) throw new RegistryClosedError();
    this.serving = true;

    const requested = Array.from(new Set(names));
    const slots = requested.map((name) => this.slotFor(name));

    const outcomes = await Promise.allSettled(
      slots.map((slot) => withAbort(slot.acquire(), options.signal))
    );
    for (const outcome of outcomes) {
      if (outcome.status === "rejected") throw outcome.reason;
    }

    return {
      get: <N extends K>(name: N): TClients[N] => {
        if (this.closed) throw new RegistryClosedError();
        const handle = this.slotFor(name).peek();
        if (handle === undefined) throw new RegistryClosedError();
        return handle;
      },
    };
  }

  peek<K extends keyof TClients & string>(name: K): TClients[K] | undefined {
    return this.slotFor(name).peek();
  }

  describe(): SlotSnapshot[] {
    return Array.from(this.declared.values(), (slot) => slot.snapshot());
  }

  /**
   * Stops serving for good: waits for in-flight constructions, then disposes
   * every ready handle. Dispose failures are logged and do not stop the others.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const slots = Array.from(this.declared.values());
    const results = await Promise.allSettled(slots.map((slot) => slot.release()));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.log.warn("Failed to release client", {
          slot: slots[index]?.name,
          error: describeError(result.reason),
        });
      }
    });
  }

  private slotFor<K extends keyof TClients & string>(name: K): ClientSlot<TClients[K]> {
    const slot = this.declared.has(name) ? this.slots[name] : undefined;
    if (!slot) throw new UnknownSlotError(name);
    return slot;
  }
}
