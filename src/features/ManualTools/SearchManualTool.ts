import type { ReadyClients } from "../../ports/clients/ClientRegistryPort";
import type {
  ArgumentSchema,
  ToolArguments,
  ToolContext,
  ToolHandler,
  ToolPayload,
} from "../../ports/tools/ToolRegistryPort";
import { COMPLETION_SLOT, SEARCH_SLOT, type ServiceClients } from "../../shared/contracts";
import { ToolExecutionError, describeError } from "../../shared/errors";
import type { ManualSettings } from "../../env";
import { ANSWER_SYSTEM_PROMPT, buildAnswerParts, excerpt, uniquePages } from "./answerPrompt";

type SearchSlots = typeof SEARCH_SLOT | typeof COMPLETION_SLOT;

export const NO_RESULTS_MESSAGE =
  "No relevant information found in the engineering manual for your query.";

export class SearchManualTool implements ToolHandler<ServiceClients, SearchSlots> {
  readonly name = "search_engineering_manual";
  readonly description =
    "Search the engineering handbook for technical specifications, formulas, charts, and guidelines " +
    "(fans, motors, ductwork, HVAC systems, wind zones, seismic zones). Relevant charts and maps are " +
    "examined by a vision model. Examples: \"What is the friction loss for round elbows?\", " +
    "\"What are the motor efficiency requirements?\"";

  readonly schema: ArgumentSchema;
  readonly requiredSlots = [SEARCH_SLOT, COMPLETION_SLOT] as const;

  constructor(private readonly settings: Pick<ManualSettings, "defaultLimit" | "maxLimit">) {
    this.schema = {
      type: "object",
      properties: {
        query: {
          type: "string",
          minLength: 1,
          description: "The technical question or search query.",
        },
        limit: {
          type: "integer",
          minimum: 1,
          maximum: settings.maxLimit,
          description: `How many handbook sections to consider (default ${settings.defaultLimit}).`,
        },
      },
      required: ["query"],
      additionalProperties: false,
    };
  }

  async exec(
    args: ToolArguments,
    clients: ReadyClients<ServiceClients, SearchSlots>,
    ctx: ToolContext
  ): Promise<ToolPayload> {
    const query = typeof args.query === "string" ? args.query.trim() : "";
    const limit = typeof args.limit === "number" ? args.limit : this.settings.defaultLimit;

    const records = await clients.get(SEARCH_SLOT).searchNear(query, limit);
    ctx.log.debug("Handbook search finished", { query, limit, hits: records.length });
    if (!records.length) {
      return { message: NO_RESULTS_MESSAGE, data: { query, pages: [], records: [] } };
    }

    let answer: string;
    try {
      answer = await clients.get(COMPLETION_SLOT).complete(
        { system: ANSWER_SYSTEM_PROMPT, parts: buildAnswerParts(query, records) },
        { signal: ctx.signal }
      );
    } catch (err) {
      throw new ToolExecutionError(`Error calling vision model: ${describeError(err)}`, { cause: err });
    }

    return {
      message: answer,
      data: {
        query,
        pages: uniquePages(records),
        records: records.map((record, rank) => ({
          rank: rank + 1,
          section: record.section,
          page: record.page,
          contentType: record.contentType,
          distance: record.distance,
          hasCriticalVisual: record.hasCriticalVisual,
          excerpt: excerpt(record.content),
        })),
      },
    };
  }
}
