import { ITEM_NAMES } from "../types";

/**
 * Structured-output schema for the intent model (Gemini `responseSchema` dialect).
 */
export const INTENT_RESPONSE_SCHEMA = {
  type: "OBJECT",
  properties: {
    operation: { type: "STRING", enum: ["GET", "POST"] },
    item: { type: "STRING", enum: [...ITEM_NAMES], nullable: true },
    change: { type: "INTEGER", nullable: true },
    reasoning: { type: "STRING" }
  },
  required: ["operation", "reasoning"]
};
