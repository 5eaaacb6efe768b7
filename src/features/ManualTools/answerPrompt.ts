import type { CompletionPart } from "../../ports/completion/CompletionPort";
import type { ManualRecord } from "../../ports/search/VectorSearchPort";

export const ANSWER_SYSTEM_PROMPT =
  "You are a technical assistant. When images are provided, examine them carefully for specific information like locations on maps, values in charts, or specifications in tables.";

export const EXCERPT_LENGTH = 500;

export function excerpt(content: string, length = EXCERPT_LENGTH): string {
  return content.length > length ? `${content.slice(0, length)}...` : content;
}

export function uniquePages(records: ManualRecord[]): number[] {
  return Array.from(new Set(records.map((record) => record.page)));
}

export function buildAnswerText(question: string, records: ManualRecord[]): string {
  const context = records
    .map((record) => `[${record.section} - Page ${record.page}]\n${excerpt(record.content)}`)
    .join("\n");

  return [
    "You are a technical assistant helping with engineering specifications.",
    "",
    `Question: ${question}`,
    "",
    "Initial analysis from search system:",
    `Found relevant information on pages: ${uniquePages(records).join(", ")}`,
    "",
    "Additional context from relevant sections:",
    context,
    "",
    "Please provide a comprehensive answer. If images are provided, carefully examine them for specific information like maps, charts, or diagrams that may contain data not in the text.",
  ].join("\n");
}

/** Question and context first, then one image part per record with a critical visual. */
export function buildAnswerParts(question: string, records: ManualRecord[]): CompletionPart[] {
  const parts: CompletionPart[] = [{ type: "text", text: buildAnswerText(question, records) }];
  for (const record of records) {
    if (record.hasCriticalVisual && record.visualContent) {
      parts.push({ type: "image", base64: record.visualContent, mimeType: "image/png" });
    }
  }
  return parts;
}
