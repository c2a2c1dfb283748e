import axios from "axios";
import {
  InternalError,
  MalformedResponseError,
  ServiceError,
  UpstreamError,
  UpstreamUnavailableError
} from "../errors";
import { rawIntentSchema } from "../schemas/requests";
import { RawIntent } from "../types";

export function parseIntentText(text: string): RawIntent {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new MalformedResponseError(`Failed to parse JSON response from model. Raw text: ${text}`);
  }
  const parsed = rawIntentSchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedResponseError(`Failed to parse JSON response from model. Raw text: ${text}`);
  }
  return parsed.data;
}

export function mapUpstreamError(e: unknown, apiName: string): ServiceError {
  if (e instanceof ServiceError) return e;
  if (axios.isAxiosError(e)) {
    if (e.response) {
      const data: unknown = e.response.data;
      const body = typeof data === "string" ? data : JSON.stringify(data);
      return new UpstreamError(e.response.status, `${apiName} returned an error: ${body}`);
    }
    return new UpstreamUnavailableError(`Failed to connect to ${apiName}: ${e.message}`);
  }
  if (e instanceof Error) {
    return new InternalError(`An unexpected error occurred during LLM call: ${e.name}: ${e.message}`);
  }
  return new InternalError(`An unexpected error occurred during LLM call: ${String(e)}`);
}
