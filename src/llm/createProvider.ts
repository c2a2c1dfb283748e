import { Config } from "../config";
import { LLMProvider } from "./LLMProvider";
import { GeminiProvider } from "./providers/GeminiProvider";
import { OpenAIProvider } from "./providers/OpenAIProvider";
import { StubProvider } from "./providers/StubProvider";

export function createProvider(cfg: Config): LLMProvider {
  if (cfg.llmProvider === "stub") {
    return new StubProvider();
  }
  if (cfg.llmProvider === "openai") {
    return new OpenAIProvider({
      apiKey: cfg.openaiKey,
      model: cfg.openaiModel,
      baseUrl: cfg.openaiBaseUrl,
      timeoutMs: cfg.llmTimeoutMs
    });
  }
  return new GeminiProvider({
    apiKey: cfg.geminiKey,
    model: cfg.geminiModel,
    baseUrl: cfg.geminiBaseUrl,
    timeoutMs: cfg.llmTimeoutMs
  });
}

/** Name of the environment variable holding the active provider's key, if it needs one and it is unset. */
export function missingCredential(cfg: Config): string | null {
  if (cfg.llmProvider === "gemini" && !cfg.geminiKey) return "GEMINI_API_KEY";
  if (cfg.llmProvider === "openai" && !cfg.openaiKey) return "OPENAI_API_KEY";
  return null;
}
