import OpenAI from "openai";
import type { ChatCompletionContentPart } from "openai/resources";
import type { CompletionConfig } from "../../env";
import type {
  CompletionOptions,
  CompletionPart,
  CompletionPort,
  CompletionRequest,
} from "../../ports/completion/CompletionPort";

function toContentPart(part: CompletionPart): ChatCompletionContentPart {
  if (part.type === "text") {
    return { type: "text", text: part.text };
  }
  return {
    type: "image_url",
    image_url: { url: `data:${part.mimeType};base64,${part.base64}`, detail: "high" },
  };
}

export class OpenAiCompletion implements CompletionPort {
  private readonly client: OpenAI;

  constructor(private readonly config: CompletionConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async complete(request: CompletionRequest, options: CompletionOptions = {}): Promise<string> {
    const resp = await this.client.chat.completions.create(
      {
        model: this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.parts.map(toContentPart) },
        ],
      },
      { signal: options.signal }
    );

    const content = resp.choices?.[0]?.message?.content?.trim();
    if (!content) {
      throw new Error("Completion service returned no content.");
    }
    return content;
  }
}
