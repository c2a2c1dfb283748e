import { InvalidItemError, InvalidRequestError, NegativeStockError } from "../errors";
import { Inventory, isItemName } from "../types";

export const DEFAULT_STOCK: Inventory = { tshirts: 20, pants: 15 };

/**
 * Owns the stock counts for the fixed item set. `update` runs to completion
 * without awaiting, so its check-then-write cannot interleave with another
 * request on the event loop.
 */
export class InventoryStore {
  private readonly stock: Inventory;

  constructor(seed: Inventory = DEFAULT_STOCK) {
    this.stock = { ...seed };
  }

  read(): Inventory {
    return { ...this.stock };
  }

  update(item: string, change: number): Inventory {
    const name = item.toLowerCase();
    if (!isItemName(name)) {
      throw new InvalidItemError(`Invalid item: '${item}'. Only 'tshirts' and 'pants' are supported.`);
    }
    const current = this.stock[name];
    const next = current + change;
    if (next < 0) {
      throw new NegativeStockError(
        `Cannot reduce '${name}' stock below zero. Current: ${current}, Attempted change: ${change}`
      );
    }
    if (!Number.isSafeInteger(next)) {
      throw new InvalidRequestError(
        `Cannot change '${name}' stock beyond the safe integer range. Current: ${current}, Attempted change: ${change}`
      );
    }
    this.stock[name] = next;
    return this.read();
  }
}
