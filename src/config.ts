import dotenv from "dotenv";
dotenv.config();

export type LLMProviderName = "gemini" | "openai" | "stub";

function providerName(value: string | undefined): LLMProviderName {
  if (value === "openai" || value === "stub") return value;
  return "gemini";
}

export function numberFrom(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  port: numberFrom(process.env.PORT, 3000),
  inventoryPort: numberFrom(process.env.INVENTORY_PORT, 8000),
  inventoryServiceUrl: process.env.INVENTORY_SERVICE_URL || "http://localhost:8000",
  inventoryTimeoutMs: numberFrom(process.env.INVENTORY_TIMEOUT_MS, 10000),
  llmProvider: providerName(process.env.LLM_PROVIDER),
  llmTimeoutMs: numberFrom(process.env.LLM_TIMEOUT_MS, 30000),
  geminiKey: process.env.GEMINI_API_KEY,
  geminiModel: process.env.GEMINI_MODEL || "gemini-2.0-flash",
  geminiBaseUrl: process.env.GEMINI_BASE_URL || "https://generativelanguage.googleapis.com",
  openaiKey: process.env.OPENAI_API_KEY,
  openaiModel: process.env.OPENAI_MODEL || "gpt-4o",
  openaiBaseUrl: process.env.OPENAI_BASE_URL || "https://api.openai.com",
  logLevel: process.env.LOG_LEVEL || "info"
};

export type Config = typeof config;
