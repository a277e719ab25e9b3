import { createHash } from "node:crypto";
import { QdrantClient, type Schemas } from "@qdrant/js-client-rest";

export type Distance = Schemas["Distance"];
export type PayloadIndexSchema = "keyword" | "integer" | "float" | "bool" | "datetime" | "text";
export type PayloadValue = string | number | boolean;
export type Payload = Record<string, unknown>;

/** Field → exact value; every pair must match */
export type MatchFilter = Record<string, PayloadValue>;

export interface CollectionInfo {
  name: string;
  vectorSize: number;
  pointsCount: number;
  distance: Distance;
}

export interface SearchResult {
  id: string | number;
  score: number;
  payload?: Payload;
}

export interface PointInput {
  id: string | number;
  vector: number[];
  payload?: Payload;
}

/**
 * Converts a string ID to UUID format if it's not already a UUID.
 * Qdrant requires string IDs to be in UUID format.
 */
export function normalizeId(id: string | number): string | number {
  if (typeof id === "number") {
    return id;
  }

  const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
  if (uuidRegex.test(id)) {
    return id;
  }

  // Deterministic: the same chunk id always maps to the same point
  const hash = createHash("sha256").update(id).digest("hex");
  return `${hash.slice(0, 8)}-${hash.slice(8, 12)}-${hash.slice(12, 16)}-${hash.slice(16, 20)}-${hash.slice(20, 32)}`;
}

export function toQdrantFilter(filter: MatchFilter): Schemas["Filter"] | undefined {
  const entries = Object.entries(filter);
  if (entries.length === 0) {
    return undefined;
  }
  return {
    must: entries.map(([key, value]) => ({ key, match: { value } })),
  };
}

function describeError(error: unknown): string {
  if (typeof error === "object" && error !== null) {
    if ("data" in error && typeof error.data === "object" && error.data !== null && "status" in error.data) {
      const status = error.data.status;
      if (typeof status === "object" && status !== null && "error" in status && typeof status.error === "string") {
        return status.error;
      }
    }
    if (error instanceof Error) {
      return error.message;
    }
  }
  return String(error);
}

export class QdrantManager {
  private client: QdrantClient;

  constructor(url: string = "http://localhost:6333", apiKey?: string) {
    this.client = new QdrantClient({ url, apiKey });
  }

  async createCollection(name: string, vectorSize: number, distance: Distance = "Cosine"): Promise<void> {
    await this.client.createCollection(name, {
      vectors: {
        size: vectorSize,
        distance,
      },
    });
  }

  /**
   * IMPORTANT: Indexes should be created immediately after collection setup.
   * Creating them on large existing collections may be slow and block updates.
   */
  async createPayloadIndex(collectionName: string, fieldName: string, fieldSchema: PayloadIndexSchema): Promise<void> {
    await this.client.createPayloadIndex(collectionName, {
      field_name: fieldName,
      field_schema: fieldSchema,
      wait: true,
    });
  }

  async hasPayloadIndex(collectionName: string, fieldName: string): Promise<boolean> {
    try {
      const info = await this.client.getCollection(collectionName);
      const indexes = info.payload_schema || {};
      return fieldName in indexes;
    } catch {
      return false;
    }
  }

  /**
   * Returns true if the index was created, false if it already existed.
   */
  async ensurePayloadIndex(collectionName: string, fieldName: string, fieldSchema: PayloadIndexSchema): Promise<boolean> {
    const exists = await this.hasPayloadIndex(collectionName, fieldName);
    if (exists) {
      return false;
    }
    await this.createPayloadIndex(collectionName, fieldName, fieldSchema);
    return true;
  }

  async collectionExists(name: string): Promise<boolean> {
    try {
      await this.client.getCollection(name);
      return true;
    } catch {
      return false;
    }
  }

  async getCollectionInfo(name: string): Promise<CollectionInfo> {
    const info = await this.client.getCollection(name);
    const vectorConfig = info.config.params.vectors;

    let size = 0;
    let distance: Distance = "Cosine";
    if (typeof vectorConfig === "object" && vectorConfig !== null && "size" in vectorConfig) {
      size = typeof vectorConfig.size === "number" ? vectorConfig.size : 0;
      distance = vectorConfig.distance;
    }

    return {
      name,
      vectorSize: size,
      pointsCount: info.points_count || 0,
      distance,
    };
  }

  async addPoints(collectionName: string, points: PointInput[]): Promise<void> {
    // Guard against empty arrays - Qdrant throws "Empty update request"
    if (points.length === 0) {
      return;
    }

    try {
      await this.client.upsert(collectionName, {
        wait: true,
        points: points.map((point) => ({
          ...point,
          id: normalizeId(point.id),
        })),
      });
    } catch (error: unknown) {
      throw new Error(`Failed to add points to collection "${collectionName}": ${describeError(error)}`);
    }
  }

  async search(
    collectionName: string,
    vector: number[],
    limit: number = 5,
    filter: MatchFilter = {},
  ): Promise<SearchResult[]> {
    const results = await this.client.search(collectionName, {
      vector,
      limit,
      filter: toQdrantFilter(filter),
      with_payload: true,
    });

    return results.map((result) => ({
      id: result.id,
      score: result.score,
      payload: result.payload || undefined,
    }));
  }

  async countPoints(collectionName: string, filter: MatchFilter = {}): Promise<number> {
    const result = await this.client.count(collectionName, {
      filter: toQdrantFilter(filter),
      exact: true,
    });
    return result.count;
  }

  /**
   * Deletes every point matching the filter. An empty filter is refused.
   */
  async deletePointsByFilter(collectionName: string, filter: MatchFilter): Promise<void> {
    const qdrantFilter = toQdrantFilter(filter);
    if (!qdrantFilter) {
      throw new Error("deletePointsByFilter requires at least one filter condition");
    }
    await this.client.delete(collectionName, {
      wait: true,
      filter: qdrantFilter,
    });
  }
}
