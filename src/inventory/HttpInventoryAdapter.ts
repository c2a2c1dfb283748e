import axios, { AxiosInstance } from "axios";
import {
  isErrorKind,
  MalformedResponseError,
  ServiceError,
  UpstreamError,
  UpstreamUnavailableError
} from "../errors";
import { logger } from "../logger";
import { errorBodySchema, inventorySchema } from "../schemas/requests";
import { Inventory } from "../types";
import { InventoryAdapter } from "./InventoryAdapter";

const log = logger.child({ component: "inventory-client" });

export class HttpInventoryAdapter implements InventoryAdapter {
  private readonly http: AxiosInstance;

  constructor(private readonly baseUrl: string, timeoutMs: number) {
    this.http = axios.create({ baseURL: baseUrl, timeout: timeoutMs });
  }

  async read(): Promise<Inventory> {
    try {
      const resp = await this.http.get<unknown>("/inventory");
      return this.parseInventory(resp.data);
    } catch (e) {
      throw this.mapError(e);
    }
  }

  async update(item: string, change: number): Promise<Inventory> {
    try {
      const resp = await this.http.post<unknown>("/inventory", { item, change });
      return this.parseInventory(resp.data);
    } catch (e) {
      throw this.mapError(e);
    }
  }

  private parseInventory(data: unknown): Inventory {
    const parsed = inventorySchema.safeParse(data);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Inventory Service returned an unexpected payload: ${JSON.stringify(data)}`
      );
    }
    return parsed.data;
  }

  private mapError(e: unknown): unknown {
    if (!axios.isAxiosError(e)) return e;
    if (e.response) {
      const status = e.response.status;
      const body = errorBodySchema.safeParse(e.response.data);
      const detail = body.success ? body.data.detail : "No specific error detail from Inventory Service.";
      const message = `Inventory Service returned an error: ${detail} (HTTP ${status})`;
      const kind = body.success ? body.data.error : undefined;
      log.warn({ status, kind, detail }, "inventory service returned an error");
      // keep the store's own kind (InvalidItem, NegativeStockRejected) for callers
      return kind && isErrorKind(kind) ? new ServiceError(kind, status, message) : new UpstreamError(status, message);
    }
    log.error({ err: e.message, baseUrl: this.baseUrl }, "inventory service unreachable");
    return new UpstreamUnavailableError(`Failed to connect to Inventory Service at ${this.baseUrl}: ${e.message}`);
  }
}
