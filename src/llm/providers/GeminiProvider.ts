import axios from "axios";
import { z } from "zod";
import { ConfigurationError, MalformedResponseError } from "../../errors";
import { logger } from "../../logger";
import { buildIntentPrompt } from "../../prompts/inventoryIntent";
import { INTENT_RESPONSE_SCHEMA } from "../../schemas/inventoryIntent";
import { RawIntent } from "../../types";
import { HostedProviderOptions, LLMProvider } from "../LLMProvider";
import { mapUpstreamError, parseIntentText } from "../upstream";

const log = logger.child({ component: "gemini" });

const generateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string() })).min(1)
        })
      })
    )
    .min(1)
});

export class GeminiProvider implements LLMProvider {
  readonly name = "gemini";

  constructor(private readonly options: HostedProviderOptions) {}

  async interpret(text: string): Promise<RawIntent> {
    if (!this.options.apiKey) {
      throw new ConfigurationError(
        "Gemini API key is not configured. Please set the GEMINI_API_KEY environment variable."
      );
    }

    const payload = {
      contents: [{ role: "user", parts: [{ text: buildIntentPrompt(text) }] }],
      generationConfig: {
        responseMimeType: "application/json",
        responseSchema: INTENT_RESPONSE_SCHEMA
      }
    };
    const url = `${this.options.baseUrl}/v1beta/models/${this.options.model}:generateContent`;

    let result: unknown;
    try {
      const resp = await axios.post<unknown>(url, payload, {
        params: { key: this.options.apiKey },
        headers: { "Content-Type": "application/json" },
        timeout: this.options.timeoutMs
      });
      result = resp.data;
    } catch (e) {
      const error = mapUpstreamError(e, "Gemini API");
      log.error({ kind: error.kind, status: error.status }, error.message);
      throw error;
    }
    log.debug({ result }, "raw Gemini result");

    const parsed = generateContentSchema.safeParse(result);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Model response did not contain expected content structure. Raw result: ${JSON.stringify(result)}`
      );
    }
    const content = parsed.data.candidates[0].content.parts[0].text;
    return parseIntentText(content);
  }
}
