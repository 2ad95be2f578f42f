import { BackendUnavailableError, ContentFilteredError } from "./errors";
import { toBackendError } from "./backend-errors";

export interface TextGenerator {
  /**
   * Produce text for `prompt`, reading only the supplied context entries.
   * Fails with BackendUnavailableError, RateLimitedError or ContentFilteredError.
   */
  generate(prompt: string, context: readonly string[]): Promise<string>;
}

type ChatMessage = { role: "system" | "user"; content: string };

/** The slice of the OpenAI SDK the generator needs. */
export type ChatCompletionsClient = {
  chat: {
    completions: {
      create(
        body: { model: string; messages: ChatMessage[]; temperature?: number; max_tokens?: number },
        options?: { timeout?: number; maxRetries?: number }
      ): Promise<{
        choices: Array<{ message: { content: string | null }; finish_reason: string }>;
      }>;
    };
  };
};

type OpenAITextGeneratorOptions = {
  client: ChatCompletionsClient;
  model: string;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
};

export function formatContextBlock(context: readonly string[]): string | null {
  const entries = context.map((entry) => entry.trim()).filter(Boolean);
  if (!entries.length) return null;
  return ["Context:", ...entries].join("\n\n");
}

export function createOpenAITextGenerator(options: OpenAITextGeneratorOptions): TextGenerator {
  const { client, model, timeoutMs, temperature = 0.4, maxTokens = 1024 } = options;
  return {
    async generate(prompt: string, context: readonly string[]): Promise<string> {
      const messages: ChatMessage[] = [];
      const contextBlock = formatContextBlock(context);
      if (contextBlock) messages.push({ role: "system", content: contextBlock });
      messages.push({ role: "user", content: prompt });

      let completion: Awaited<ReturnType<ChatCompletionsClient["chat"]["completions"]["create"]>>;
      try {
        completion = await client.chat.completions.create(
          { model, messages, temperature, max_tokens: maxTokens },
          { timeout: timeoutMs, maxRetries: 0 }
        );
      } catch (error) {
        throw toBackendError(error, "generation");
      }

      const choice = completion.choices[0];
      if (!choice) throw new BackendUnavailableError("generation: provider returned no choices");
      if (choice.finish_reason === "content_filter") {
        throw new ContentFilteredError("generation: completion stopped by the provider's content filter");
      }
      const text = choice.message.content?.trim() ?? "";
      if (!text) throw new BackendUnavailableError("generation: provider returned an empty completion");
      return text;
    },
  };
}
