import { CloudClient, type Collection, type EmbeddingFunction } from "chromadb";
import { z } from "zod";
import { ConfigError } from "./errors";
import type { LlmClient } from "./llm";
import { childLogger } from "./logger";
import type { RegisterBackend, StoredExample } from "./register-store";
import { REGISTERS, type ExampleCategory, type Register, type RegisterExample, type RegisterMatch } from "./types";

const log = childLogger("chroma");

export type ChromaConfig = {
  apiKey?: string;
  tenant?: string;
  database?: string;
};

const MetadataSchema = z
  .object({
    category: z.string().optional(),
    context: z.string().optional(),
  })
  .nullable();

function isKnownCategory(value: string | undefined): value is ExampleCategory {
  return value === "phrase" || value === "keyword" || value === "tone";
}

export function collectionName(register: Register): string {
  return `sociolect_${register}`;
}

export function toExample(document: string, metadata: unknown): RegisterExample {
  const parsed = MetadataSchema.safeParse(metadata);
  const meta = parsed.success ? parsed.data : null;
  const raw = meta?.category;
  const category: ExampleCategory = isKnownCategory(raw) ? raw : "general";
  const context = meta?.context;
  return context ? { text: document, category, context } : { text: document, category };
}

export function modelEmbeddingFunction(llm: LlmClient): EmbeddingFunction {
  return {
    name: "model-provider",
    generate: (texts: string[]) => llm.embed(texts),
  };
}

export class ChromaBackend implements RegisterBackend {
  private constructor(
    private readonly client: CloudClient,
    private readonly embeddingFunction: EmbeddingFunction,
    private readonly collections: Map<Register, Collection>,
  ) {}

  static async connect(config: ChromaConfig, llm: LlmClient): Promise<ChromaBackend> {
    const missing = [
      ["CHROMA_API_KEY", config.apiKey],
      ["CHROMA_TENANT", config.tenant],
      ["CHROMA_DATABASE", config.database],
    ]
      .filter(([, v]) => !v || v.trim() === "")
      .map(([k]) => String(k));
    if (missing.length > 0) {
      throw new ConfigError(`${missing.join(", ")} is required. Set it in .env file.`, missing);
    }

    log.info({ event: "chroma.connect", tenant: config.tenant, database: config.database }, "Connecting to ChromaDB Cloud");
    const client = new CloudClient({ apiKey: config.apiKey, tenant: config.tenant, database: config.database });
    const embeddingFunction = modelEmbeddingFunction(llm);

    const collections = new Map<Register, Collection>();
    for (const register of REGISTERS) {
      collections.set(register, await openCollection(client, register, embeddingFunction));
    }
    log.info({ event: "chroma.ready", collections: collections.size }, "Collections ready");
    return new ChromaBackend(client, embeddingFunction, collections);
  }

  private collection(register: Register): Collection {
    const collection = this.collections.get(register);
    if (!collection) throw new Error(`Invalid register: ${register}`);
    return collection;
  }

  async count(register: Register): Promise<number> {
    return this.collection(register).count();
  }

  async upsert(register: Register, entries: StoredExample[]): Promise<void> {
    if (entries.length === 0) return;
    await this.collection(register).upsert({
      ids: entries.map((e) => e.id),
      documents: entries.map((e) => e.example.text),
      metadatas: entries.map((e) => ({
        category: e.example.category,
        context: e.example.context ?? "",
        sociolect: register,
      })),
    });
  }

  async query(register: Register, text: string, k: number, category?: ExampleCategory): Promise<RegisterMatch[]> {
    const result = await this.collection(register).query({
      queryTexts: [text],
      nResults: k,
      where: category ? { category } : undefined,
    });

    const documents = result.documents[0] ?? [];
    const metadatas = result.metadatas[0] ?? [];
    const distances = result.distances?.[0] ?? [];

    const matches: RegisterMatch[] = [];
    documents.forEach((doc, i) => {
      if (doc === null) return;
      matches.push({ ...toExample(doc, metadatas[i]), distance: distances[i] ?? null });
    });
    return matches;
  }

  async getAll(register: Register): Promise<RegisterExample[]> {
    const result = await this.collection(register).get();
    const examples: RegisterExample[] = [];
    result.documents.forEach((doc, i) => {
      if (doc !== null) examples.push(toExample(doc, result.metadatas[i]));
    });
    return examples;
  }

  async reset(register: Register): Promise<void> {
    await this.client.deleteCollection({ name: collectionName(register) });
    this.collections.set(register, await openCollection(this.client, register, this.embeddingFunction));
  }
}

async function openCollection(
  client: CloudClient,
  register: Register,
  embeddingFunction: EmbeddingFunction,
): Promise<Collection> {
  return client.getOrCreateCollection({
    name: collectionName(register),
    metadata: { description: `Language patterns for ${register}` },
    embeddingFunction,
  });
}
