export type CompletionPart =
  | { type: "text"; text: string }
  | { type: "image"; base64: string; mimeType: string };

export interface CompletionRequest {
  system: string;
  parts: CompletionPart[];
  maxTokens?: number;
}

export interface CompletionOptions {
  signal?: AbortSignal;
}

export interface CompletionPort {
  complete(request: CompletionRequest, options?: CompletionOptions): Promise<string>;
}
