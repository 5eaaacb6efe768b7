import type { ReadyClients } from "../../ports/clients/ClientRegistryPort";
import type {
  ArgumentSchema,
  ToolArguments,
  ToolContext,
  ToolHandler,
  ToolImage,
  ToolPayload,
} from "../../ports/tools/ToolRegistryPort";
import { SEARCH_SLOT, type ServiceClients } from "../../shared/contracts";
import { ToolExecutionError } from "../../shared/errors";

const PAGE_OBJECT_LIMIT = 10;

export class GetPageTool implements ToolHandler<ServiceClients, typeof SEARCH_SLOT> {
  readonly name = "get_page_direct";
  readonly description =
    "Retrieve a specific page of the engineering handbook by page number. Use this when you know the " +
    "exact page you need or when search results reference a specific page.";

  readonly schema: ArgumentSchema;
  readonly requiredSlots = [SEARCH_SLOT] as const;

  constructor(private readonly pageCount: number) {
    this.schema = {
      type: "object",
      properties: {
        page_number: {
          type: "integer",
          minimum: 1,
          maximum: pageCount,
          description: `Page number (1-${pageCount}).`,
        },
      },
      required: ["page_number"],
      additionalProperties: false,
    };
  }

  async exec(
    args: ToolArguments,
    clients: ReadyClients<ServiceClients, typeof SEARCH_SLOT>,
    _ctx: ToolContext
  ): Promise<ToolPayload> {
    const page = args.page_number;
    if (typeof page !== "number") {
      throw new ToolExecutionError("page_number must be a number");
    }

    const records = await clients.get(SEARCH_SLOT).fetchPage(page, PAGE_OBJECT_LIMIT);
    if (!records.length) {
      return {
        message: `No content found for page ${page}. The manual contains pages 1-${this.pageCount}.`,
        data: { page, sections: [] },
      };
    }

    const body = records.map((record) => `[${record.section}]\n\n${record.content}`).join("\n\n---\n\n");
    const images: ToolImage[] = records.flatMap((record) =>
      record.hasCriticalVisual && record.visualContent
        ? [{ data: record.visualContent, mimeType: "image/png" }]
        : []
    );

    return {
      message: `Content from Page ${page}:\n\n${body}`,
      data: {
        page,
        sections: records.map((record) => ({
          section: record.section,
          contentType: record.contentType,
          visualDescription: record.visualDescription,
        })),
      },
      images,
    };
  }
}
