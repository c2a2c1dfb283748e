import { MalformedResponseError } from "../errors";
import { describeIssues, intentFieldsSchema } from "../schemas/requests";
import { Intent, RawIntent } from "../types";

export const DEFAULT_REASONING = "No specific reasoning provided by the model.";

/**
 * Narrows the model's loosely typed payload to a read, write or unsupported
 * intent. Fields are only type-checked here; whether a write names a known item
 * or carries a change is decided by the caller.
 */
export function classifyIntent(raw: RawIntent): Intent {
  const parsed = intentFieldsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResponseError(
      `Model response is not a valid intent (${describeIssues(parsed.error)}). Received: ${JSON.stringify(raw)}`
    );
  }
  const { operation, item, change } = parsed.data;
  const reasoning = parsed.data.reasoning || DEFAULT_REASONING;

  switch (operation.toUpperCase()) {
    case "GET":
    case "READ":
      return { kind: "read", item: item ?? null, reasoning };
    case "POST":
    case "WRITE":
      return { kind: "write", item: item ?? null, change: change ?? null, reasoning };
    default:
      return { kind: "unsupported", operation, reasoning };
  }
}
