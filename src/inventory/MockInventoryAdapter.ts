import { Inventory } from "../types";
import { InventoryAdapter } from "./InventoryAdapter";
import { InventoryStore } from "./InventoryStore";

/** Talks to an in-process store instead of the inventory service. */
export class MockInventoryAdapter implements InventoryAdapter {
  constructor(private readonly store: InventoryStore = new InventoryStore()) {}

  async read(): Promise<Inventory> {
    return this.store.read();
  }

  async update(item: string, change: number): Promise<Inventory> {
    return this.store.update(item, change);
  }
}
