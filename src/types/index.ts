export const ITEM_NAMES = ["tshirts", "pants"] as const;

export type ItemName = (typeof ITEM_NAMES)[number];

export type Inventory = Record<ItemName, number>;

export type InventoryUpdateRequest = {
  item: string;
  change: number;
};

/** JSON object as returned by the model, before any checks on its fields. */
export type RawIntent = Record<string, unknown>;

export type Intent =
  | { kind: "read"; item: string | null; reasoning: string }
  | { kind: "write"; item: string | null; change: number | null; reasoning: string }
  | { kind: "unsupported"; operation: string; reasoning: string };

export type QueryResponse = {
  message: string;
  inventory_state: Inventory | null;
  error: string | null;
};

export function isItemName(value: string): value is ItemName {
  return (ITEM_NAMES as readonly string[]).includes(value);
}
