import type { ClientRegistryPort, SlotSnapshot } from "../../ports/clients/ClientRegistryPort";
import type {
  ArgumentSchema,
  ToolArguments,
  ToolContext,
  ToolHandler,
  ToolPayload,
} from "../../ports/tools/ToolRegistryPort";
import { SEARCH_SLOT, type ServiceClients, type ServiceSlot } from "../../shared/contracts";
import { describeError } from "../../shared/errors";
import { withAbort } from "../../runtime/cancellation";

type Connectivity = "reachable" | "unreachable" | "not_connected";

/** Problems with a slot's configuration, keyed by slot. Must not construct clients. */
export type ConfigurationCheck = () => Partial<Record<ServiceSlot, string>>;

function describeSlot(slot: SlotSnapshot): string {
  const attempts = slot.attempts === 1 ? "1 attempt" : `${slot.attempts} attempts`;
  const detail = slot.lastError ? `: ${slot.lastError}` : "";
  return `- ${slot.name}: ${slot.status} (${attempts})${detail}`;
}

/**
 * Reports the lifecycle of every client slot. It needs no clients of its own,
 * so it answers even when a backend is misconfigured or unreachable.
 */
export class ServiceStatusTool implements ToolHandler<ServiceClients, never> {
  readonly name = "service_status";
  readonly description =
    "Report which backend clients are connected, still uninitialized, or failed, with the last error " +
    "for failed ones. Never connects a client.";

  readonly schema: ArgumentSchema = {
    type: "object",
    properties: {
      check_connectivity: {
        type: "boolean",
        description: "Also ask an already connected search backend whether it is reachable.",
      },
    },
    required: [],
    additionalProperties: false,
  };

  readonly requiredSlots: readonly never[] = [];

  constructor(
    private readonly registry: ClientRegistryPort<ServiceClients>,
    private readonly checkConfiguration: ConfigurationCheck = () => ({})
  ) {}

  async exec(args: ToolArguments, _clients: unknown, ctx: ToolContext): Promise<ToolPayload> {
    const slots = this.registry.describe();
    const issues = this.checkConfiguration();
    const lines = ["Service status:", ...slots.map(describeSlot)];
    const problems = Object.entries(issues);
    if (problems.length) {
      lines.push("Configuration problems:", ...problems.map(([slot, issue]) => `- ${slot}: ${issue}`));
    }
    const data: Record<string, unknown> = { slots, configurationIssues: issues };

    if (args.check_connectivity === true) {
      const connectivity = await this.checkSearch(ctx);
      lines.push(`Search backend connectivity: ${connectivity}`);
      data.searchConnectivity = connectivity;
    }

    return { message: lines.join("\n"), data };
  }

  private async checkSearch(ctx: ToolContext): Promise<Connectivity> {
    const search = this.registry.peek(SEARCH_SLOT);
    if (!search) return "not_connected";
    try {
      return (await withAbort(search.isReady(), ctx.signal)) ? "reachable" : "unreachable";
    } catch (err) {
      ctx.log.warn("Search backend readiness check failed", { error: describeError(err) });
      return "unreachable";
    }
  }
}
