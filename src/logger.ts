import pino from "pino";
import { config } from "./config";

export const logger = pino({
  name: "stock-assistant",
  level: config.logLevel
});
