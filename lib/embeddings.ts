import { BackendUnavailableError } from "./errors";
import { toBackendError } from "./backend-errors";

export interface EmbeddingBackend {
  /** Fails with BackendUnavailableError or RateLimitedError. */
  embed(text: string): Promise<number[]>;
}

/** The slice of the OpenAI SDK the embedding backend needs. */
export type EmbeddingsClient = {
  embeddings: {
    create(
      body: { model: string; input: string; encoding_format?: "float" },
      options?: { timeout?: number; maxRetries?: number }
    ): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
};

type OpenAIEmbeddingOptions = {
  client: EmbeddingsClient;
  model: string;
  timeoutMs: number;
};

const MAX_EMBED_INPUT_CHARS = 8000; // ~8k chars stays inside the model's token limit

/**
 * Embedding backend over any OpenAI-compatible /embeddings endpoint.
 */
export function createOpenAIEmbeddingBackend(options: OpenAIEmbeddingOptions): EmbeddingBackend {
  const { client, model, timeoutMs } = options;
  return {
    async embed(text: string): Promise<number[]> {
      if (!text || text.trim().length === 0) {
        throw new Error("Cannot generate embedding for empty text");
      }
      let response: Awaited<ReturnType<EmbeddingsClient["embeddings"]["create"]>>;
      try {
        response = await client.embeddings.create(
          {
            model,
            input: text.trim().slice(0, MAX_EMBED_INPUT_CHARS),
            encoding_format: "float",
          },
          { timeout: timeoutMs, maxRetries: 0 }
        );
      } catch (error) {
        throw toBackendError(error, "embeddings");
      }
      const vector = response.data[0]?.embedding;
      if (!Array.isArray(vector) || vector.length === 0) {
        throw new BackendUnavailableError("embeddings: provider returned no vector");
      }
      return vector;
    },
  };
}
