import weaviate, { type WeaviateClient } from "weaviate-client";
import type { VectorSearchConfig } from "../../env";
import type { ManualRecord, VectorSearchPort } from "../../ports/search/VectorSearchPort";

const RETURN_PROPERTIES: string[] = [
  "content",
  "section",
  "page",
  "content_type",
  "has_critical_visual",
  "visual_content",
  "visual_description",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function toManualRecord(properties: unknown, distance?: number): ManualRecord | null {
  if (!isRecord(properties)) return null;
  const page = typeof properties.page === "number" ? properties.page : Number(properties.page);
  if (!Number.isFinite(page)) return null;

  const visualContent = optionalString(properties.visual_content);
  return {
    content: typeof properties.content === "string" ? properties.content : "",
    section: typeof properties.section === "string" ? properties.section : "Untitled section",
    page,
    contentType: optionalString(properties.content_type),
    hasCriticalVisual: properties.has_critical_visual === true && visualContent !== undefined,
    visualContent,
    visualDescription: optionalString(properties.visual_description),
    distance,
  };
}

export class WeaviateManualSearch implements VectorSearchPort {
  /** Opens the cloud connection; the client checks liveness before resolving. */
  static async connect(config: VectorSearchConfig): Promise<WeaviateManualSearch> {
    const client = await weaviate.connectToWeaviateCloud(config.url, {
      authCredentials: new weaviate.ApiKey(config.apiKey),
      headers: config.headers,
    });
    return new WeaviateManualSearch(client, config.collection);
  }

  constructor(
    private readonly client: WeaviateClient,
    private readonly collectionName: string
  ) {}

  async searchNear(query: string, limit: number): Promise<ManualRecord[]> {
    const collection = this.client.collections.get(this.collectionName);
    const result = await collection.query.nearText(query, {
      limit,
      returnProperties: RETURN_PROPERTIES,
      returnMetadata: ["distance"],
    });
    return result.objects
      .map((object) => toManualRecord(object.properties, object.metadata?.distance))
      .filter((record): record is ManualRecord => record !== null);
  }

  async fetchPage(page: number, limit: number): Promise<ManualRecord[]> {
    const collection = this.client.collections.get(this.collectionName);
    const result = await collection.query.fetchObjects({
      filters: collection.filter.byProperty("page").equal(page),
      limit,
      returnProperties: RETURN_PROPERTIES,
    });
    return result.objects
      .map((object) => toManualRecord(object.properties))
      .filter((record): record is ManualRecord => record !== null);
  }

  isReady(): Promise<boolean> {
    return this.client.isReady();
  }

  close(): Promise<void> {
    return this.client.close();
  }
}
