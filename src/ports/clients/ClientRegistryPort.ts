export type SlotStatus = "uninitialized" | "initializing" | "ready" | "failed";

export interface SlotSnapshot {
  name: string;
  status: SlotStatus;
  attempts: number;
  lastError?: string;
  readyAt?: string;
  failedAt?: string;
}

/** Handles acquired by one `ensureReady` call, restricted to the requested slots. */
export interface ReadyClients<TClients, K extends keyof TClients> {
  get<N extends K>(name: N): TClients[N];
}

export interface EnsureReadyOptions {
  /** Cancels this caller's wait only; construction keeps running for other callers. */
  signal?: AbortSignal;
}

export interface ClientRegistryPort<TClients> {
  ensureReady<K extends keyof TClients & string>(
    names: readonly K[],
    options?: EnsureReadyOptions
  ): Promise<ReadyClients<TClients, K>>;
  peek<K extends keyof TClients & string>(name: K): TClients[K] | undefined;
  describe(): SlotSnapshot[];
}
