import express from "express";
import { InvalidRequestError } from "../errors";
import { logger } from "../logger";
import { describeIssues, inventoryUpdateSchema } from "../schemas/requests";
import { InventoryStore } from "./InventoryStore";

const log = logger.child({ component: "inventory" });

export function inventoryRouter(store: InventoryStore) {
  const router = express.Router();

  router.get("/inventory", (_req, res) => {
    res.send(store.read());
  });

  router.post("/inventory", (req, res) => {
    const body = inventoryUpdateSchema.safeParse(req.body);
    if (!body.success) {
      throw new InvalidRequestError(`Invalid update request: ${describeIssues(body.error)}`);
    }
    const updated = store.update(body.data.item, body.data.change);
    log.info({ item: body.data.item, change: body.data.change, inventory: updated }, "inventory updated");
    res.send(updated);
  });

  return router;
}
