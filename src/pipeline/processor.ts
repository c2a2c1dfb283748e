import { IncompleteIntentError, toServiceError, UnsupportedOperationError } from "../errors";
import { InventoryAdapter } from "../inventory/InventoryAdapter";
import { LLMProvider } from "../llm/LLMProvider";
import { logger } from "../logger";
import { Inventory, isItemName, QueryResponse } from "../types";
import { classifyIntent } from "./intent";

const log = logger.child({ component: "processor" });

function countOf(inventory: Inventory, item: string): number {
  const name = item.toLowerCase();
  return isItemName(name) ? inventory[name] : 0;
}

export class Processor {
  constructor(private llm: LLMProvider, private inventory: InventoryAdapter) {}

  async process(text: string): Promise<QueryResponse> {
    log.debug({ query: text }, "received query");
    try {
      return await this.handle(text);
    } catch (e) {
      throw toServiceError(e);
    }
  }

  private async handle(text: string): Promise<QueryResponse> {
    const raw = await this.llm.interpret(text);
    log.debug({ raw }, "model intent");
    const intent = classifyIntent(raw);

    switch (intent.kind) {
      case "read": {
        const state = await this.inventory.read();
        const message = intent.item
          ? `Successfully retrieved inventory for ${intent.item}: ${countOf(state, intent.item)}. Reasoning: ${intent.reasoning}`
          : `Successfully retrieved inventory. Reasoning: ${intent.reasoning}`;
        return { message, inventory_state: state, error: null };
      }
      case "write": {
        if (intent.item === null || intent.change === null) {
          throw new IncompleteIntentError(
            `Model failed to extract required 'item' or 'change' for POST operation. Model reasoning: ${intent.reasoning}`
          );
        }
        const state = await this.inventory.update(intent.item, intent.change);
        return {
          message: `Successfully updated inventory for ${intent.item} by ${intent.change}. Reasoning: ${intent.reasoning}`,
          inventory_state: state,
          error: null
        };
      }
      case "unsupported":
        throw new UnsupportedOperationError(
          `Model returned an unsupported operation: '${intent.operation}'. Model reasoning: ${intent.reasoning}`
        );
    }
  }
}
