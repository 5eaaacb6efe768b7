import type { VectorSearchPort } from "../ports/search/VectorSearchPort";
import type { CompletionPort } from "../ports/completion/CompletionPort";

export const SEARCH_SLOT = "search_backend";
export const COMPLETION_SLOT = "completion_backend";

/** Clients the tool handlers may request from the registry, keyed by slot name. */
export interface ServiceClients {
  [SEARCH_SLOT]: VectorSearchPort;
  [COMPLETION_SLOT]: CompletionPort;
}

export type ServiceSlot = keyof ServiceClients;
