import express from "express";
import bodyParser from "body-parser";
import { InventoryStore } from "./inventory/InventoryStore";
import { inventoryRouter } from "./inventory/inventoryRouter";
import { queryRouter } from "./messaging/queryRouter";
import { errorHandler } from "./middleware/errorHandler";
import { Processor } from "./pipeline/processor";

export function buildInventoryApp(store: InventoryStore) {
  const app = express();
  app.use(bodyParser.json());
  app.use("/", inventoryRouter(store));
  app.get("/health", (_req, res) => res.send({ ok: true, service: "inventory" }));
  app.use(errorHandler);
  return app;
}

export function buildQueryApp(processor: Processor, llmProvider: string) {
  const app = express();
  app.use(bodyParser.json());
  app.use("/", queryRouter(processor));
  app.get("/health", (_req, res) => res.send({ ok: true, service: "query", llmProvider }));
  app.use(errorHandler);
  return app;
}
