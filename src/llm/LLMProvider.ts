import { RawIntent } from "../types";

export interface LLMProvider {
  readonly name: string;
  /** Turns a free-text request into the model's intent object. Makes at most one upstream call. */
  interpret(text: string): Promise<RawIntent>;
}

export type HostedProviderOptions = {
  apiKey?: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
};
