import { ItemName, RawIntent } from "../../types";
import { LLMProvider } from "../LLMProvider";

const DECREASE = /\b(sold|sell(?:s|ing)?|reduc(?:e|es|ed|ing)|remov(?:e|es|ed|ing)|decreas(?:e|es|ed|ing)|minus)\b/;
const INCREASE = /\b(add(?:s|ed|ing)?|receiv(?:e|es|ed|ing)|restock(?:s|ed|ing)?|increas(?:e|es|ed|ing)|plus)\b/;

function findItem(t: string): ItemName | null {
  const tshirts = /\bt[\s-]?shirts?\b|\bshirts?\b/.test(t);
  const pants = /\bpants?\b/.test(t);
  if (tshirts && pants) return null;
  if (tshirts) return "tshirts";
  if (pants) return "pants";
  return null;
}

/** Keyword matcher standing in for a hosted model, for offline runs. */
export class StubProvider implements LLMProvider {
  readonly name = "stub";

  async interpret(text: string): Promise<RawIntent> {
    const t = (text || "").toLowerCase();
    const qtyMatch = t.match(/(\d+)/);
    const qty = qtyMatch ? parseInt(qtyMatch[1], 10) : null;
    const item = findItem(t);

    const decrease = t.match(DECREASE);
    const increase = t.match(INCREASE);
    const verb = decrease ?? increase;
    if (verb) {
      const sign = decrease ? -1 : 1;
      return {
        operation: "POST",
        item,
        change: qty === null ? null : sign * qty,
        reasoning: qty === null ? `Matched '${verb[1]}' but found no quantity.` : `Matched '${verb[1]}' with quantity ${qty}.`
      };
    }

    return {
      operation: "GET",
      item,
      change: null,
      reasoning: "No stock change requested, reading inventory."
    };
  }
}
