import axios from "axios";
import { z } from "zod";
import { ConfigurationError, MalformedResponseError } from "../../errors";
import { logger } from "../../logger";
import { buildIntentPrompt } from "../../prompts/inventoryIntent";
import { RawIntent } from "../../types";
import { HostedProviderOptions, LLMProvider } from "../LLMProvider";
import { mapUpstreamError, parseIntentText } from "../upstream";

const log = logger.child({ component: "openai" });

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() })
      })
    )
    .min(1)
});

export class OpenAIProvider implements LLMProvider {
  readonly name = "openai";

  constructor(private readonly options: HostedProviderOptions) {}

  async interpret(text: string): Promise<RawIntent> {
    if (!this.options.apiKey) {
      throw new ConfigurationError(
        "OpenAI API key is not configured. Please set the OPENAI_API_KEY environment variable."
      );
    }

    let result: unknown;
    try {
      const resp = await axios.post<unknown>(
        `${this.options.baseUrl}/v1/chat/completions`,
        {
          model: this.options.model,
          messages: [{ role: "user", content: buildIntentPrompt(text) }],
          response_format: { type: "json_object" },
          temperature: 0
        },
        {
          headers: { Authorization: `Bearer ${this.options.apiKey}` },
          timeout: this.options.timeoutMs
        }
      );
      result = resp.data;
    } catch (e) {
      const error = mapUpstreamError(e, "OpenAI API");
      log.error({ kind: error.kind, status: error.status }, error.message);
      throw error;
    }
    log.debug({ result }, "raw OpenAI result");

    const parsed = chatCompletionSchema.safeParse(result);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Model response did not contain expected content structure. Raw result: ${JSON.stringify(result)}`
      );
    }
    return parseIntentText(parsed.data.choices[0].message.content);
  }
}
