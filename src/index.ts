import { buildQueryApp } from "./app";
import { config } from "./config";
import { HttpInventoryAdapter } from "./inventory/HttpInventoryAdapter";
import { createProvider, missingCredential } from "./llm/createProvider";
import { logger } from "./logger";
import { Processor } from "./pipeline/processor";

const missing = missingCredential(config);
if (missing) {
  logger.warn(`${missing} environment variable not set. Queries will fail until it is configured.`);
}

const llm = createProvider(config);
const inventory = new HttpInventoryAdapter(config.inventoryServiceUrl, config.inventoryTimeoutMs);
const app = buildQueryApp(new Processor(llm, inventory), llm.name);

app.listen(config.port, () =>
  logger.info({ llmProvider: llm.name, inventoryServiceUrl: config.inventoryServiceUrl }, `Query service running on ${config.port}`)
);
