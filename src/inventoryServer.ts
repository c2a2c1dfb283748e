import { buildInventoryApp } from "./app";
import { config } from "./config";
import { InventoryStore } from "./inventory/InventoryStore";
import { logger } from "./logger";

const app = buildInventoryApp(new InventoryStore());

app.listen(config.inventoryPort, () => logger.info(`Inventory service running on ${config.inventoryPort}`));
