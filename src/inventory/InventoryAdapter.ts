import { Inventory } from "../types";

export interface InventoryAdapter {
  read(): Promise<Inventory>;
  update(item: string, change: number): Promise<Inventory>;
}
