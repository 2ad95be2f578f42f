import { describe, expect, it, vi } from "vitest";
import { createOpenAIEmbeddingBackend, type EmbeddingsClient } from "@/lib/embeddings";
import { createOpenAITextGenerator, formatContextBlock, type ChatCompletionsClient } from "@/lib/generation";
import { BackendUnavailableError, ContentFilteredError, RateLimitedError } from "@/lib/errors";

type EmbeddingsCreate = EmbeddingsClient["embeddings"]["create"];
type ChatCreate = ChatCompletionsClient["chat"]["completions"]["create"];

function completion(content: string | null, finishReason = "stop") {
  return { choices: [{ message: { content }, finish_reason: finishReason }] };
}

describe("createOpenAIEmbeddingBackend", () => {
  it("requests a float embedding for the trimmed text with SDK retries off", async () => {
    const create = vi.fn<EmbeddingsCreate>(async () => ({ data: [{ embedding: [0.25, 0.5] }] }));
    const backend = createOpenAIEmbeddingBackend({ client: { embeddings: { create } }, model: "embed-model", timeoutMs: 1_500 });

    expect(await backend.embed("  cells divide  ")).toEqual([0.25, 0.5]);
    expect(create).toHaveBeenCalledWith(
      { model: "embed-model", input: "cells divide", encoding_format: "float" },
      { timeout: 1_500, maxRetries: 0 }
    );
  });

  it("maps provider failures onto engine errors", async () => {
    const create = vi.fn<EmbeddingsCreate>(async () => {
      throw { status: 429, message: "Rate limit reached", headers: { "retry-after": "1" } };
    });
    const backend = createOpenAIEmbeddingBackend({ client: { embeddings: { create } }, model: "m", timeoutMs: 1_000 });

    const error = await backend.embed("cells").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ retryAfterMs: 1_000 });
  });

  it("treats an empty vector as an unavailable backend", async () => {
    const create = vi.fn<EmbeddingsCreate>(async () => ({ data: [] }));
    const backend = createOpenAIEmbeddingBackend({ client: { embeddings: { create } }, model: "m", timeoutMs: 1_000 });
    await expect(backend.embed("cells")).rejects.toBeInstanceOf(BackendUnavailableError);
  });
});

describe("createOpenAITextGenerator", () => {
  it("sends the context as a system message ahead of the prompt", async () => {
    const create = vi.fn<ChatCreate>(async () => completion("  Plants make sugar.  "));
    const generator = createOpenAITextGenerator({
      client: { chat: { completions: { create } } },
      model: "chat-model",
      timeoutMs: 2_000,
    });

    expect(await generator.generate("Explain it.", ["[S1] one", "  ", "[S2] two"])).toBe("Plants make sugar.");
    expect(create).toHaveBeenCalledWith(
      {
        model: "chat-model",
        messages: [
          { role: "system", content: "Context:\n\n[S1] one\n\n[S2] two" },
          { role: "user", content: "Explain it." },
        ],
        temperature: 0.4,
        max_tokens: 1024,
      },
      { timeout: 2_000, maxRetries: 0 }
    );
  });

  it("omits the system message without context", () => {
    expect(formatContextBlock([" ", ""])).toBeNull();
  });

  it("reports a completion stopped by the content filter", async () => {
    const create = vi.fn<ChatCreate>(async () => completion("partial", "content_filter"));
    const generator = createOpenAITextGenerator({ client: { chat: { completions: { create } } }, model: "m", timeoutMs: 1 });
    await expect(generator.generate("q", [])).rejects.toBeInstanceOf(ContentFilteredError);
  });

  it("reports empty completions and rejected prompts", async () => {
    const empty = vi.fn<ChatCreate>(async () => completion(null));
    const rejected = vi.fn<ChatCreate>(async () => {
      throw { status: 400, message: "Your request was rejected by our safety system" };
    });
    const emptyGenerator = createOpenAITextGenerator({ client: { chat: { completions: { create: empty } } }, model: "m", timeoutMs: 1 });
    const rejectedGenerator = createOpenAITextGenerator({
      client: { chat: { completions: { create: rejected } } },
      model: "m",
      timeoutMs: 1,
    });

    await expect(emptyGenerator.generate("q", [])).rejects.toBeInstanceOf(BackendUnavailableError);
    await expect(rejectedGenerator.generate("q", [])).rejects.toBeInstanceOf(ContentFilteredError);
  });
});
