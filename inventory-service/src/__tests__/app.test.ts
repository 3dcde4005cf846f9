import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../http/app";
import { InMemoryStockStore } from "./support/memory-stock.store";

describe("inventory HTTP API", () => {
  let store: InMemoryStockStore;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    store = new InMemoryStockStore().seed(42, 10).seed(43, 0);
    const app = createApp(store);

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("expected a TCP address");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
  });

  const send = (method: string, path: string, body?: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? {} : { "Content-Type": "application/json" },
      body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
    });

  describe("GET /inventory/:productId", () => {
    it("returns quantity and availability", async () => {
      const res = await send("GET", "/inventory/42");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ available: true, quantity: 10 });
    });

    it("reports an empty product as unavailable", async () => {
      const res = await send("GET", "/inventory/43");

      expect(await res.json()).toEqual({ available: false, quantity: 0 });
    });

    it("returns 404 for an unknown product", async () => {
      const res = await send("GET", "/inventory/999");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Product not found" });
    });

    it("returns 404 for a non-numeric id", async () => {
      const res = await send("GET", "/inventory/abc");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Product not found" });
    });
  });

  describe("POST /inventory", () => {
    it("creates stock for a new product", async () => {
      const res = await send("POST", "/inventory", { product_id: 7, quantity: 25 });

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({ product_id: 7, quantity: 25 });
      expect(store.quantityOf(7)).toBe(25);
    });

    it("rejects a product that already has stock", async () => {
      const res = await send("POST", "/inventory", { product_id: 42, quantity: 1 });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Insert failed" });
      expect(store.quantityOf(42)).toBe(10);
    });

    it("rejects a negative quantity", async () => {
      const res = await send("POST", "/inventory", { product_id: 8, quantity: -1 });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "Invalid request body",
        details: { quantity: ["Number must be greater than or equal to 0"] },
      });
      expect(store.rows.has(8)).toBe(false);
    });

    it("rejects a body that is not JSON", async () => {
      const res = await send("POST", "/inventory", "{product_id:");

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid JSON body" });
    });
  });

  describe("PUT /inventory/:productId", () => {
    it("sets the quantity", async () => {
      const res = await send("PUT", "/inventory/42", { product_id: 42, quantity: 3 });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ product_id: 42, quantity: 3 });
      expect(store.quantityOf(42)).toBe(3);
    });

    it("answers 200 without creating a row when there is no stock row", async () => {
      const res = await send("PUT", "/inventory/999", { product_id: 999, quantity: 3 });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ product_id: 999, quantity: 3 });
      expect(store.rows.has(999)).toBe(false);
    });

    it("returns 400 for a non-numeric id", async () => {
      const res = await send("PUT", "/inventory/abc", { product_id: 1, quantity: 3 });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid product id" });
    });

    it("returns 400 for a missing quantity", async () => {
      const res = await send("PUT", "/inventory/42", { product_id: 42 });

      expect(res.status).toBe(400);
      expect(store.quantityOf(42)).toBe(10);
    });
  });

  describe("CORS", () => {
    it("answers preflight requests with 204", async () => {
      const res = await send("OPTIONS", "/inventory");

      expect(res.status).toBe(204);
      expect(res.headers.get("access-control-allow-origin")).toBe("*");
      expect(res.headers.get("access-control-allow-methods")).toBe(
        "GET, POST, PUT, OPTIONS"
      );
      expect(res.headers.get("access-control-allow-headers")).toBe("Content-Type");
    });

    it("adds headers to regular and error responses", async () => {
      const ok = await send("GET", "/inventory/42");
      const missing = await send("GET", "/nowhere");

      expect(ok.headers.get("access-control-allow-origin")).toBe("*");
      expect(missing.status).toBe(404);
      expect(missing.headers.get("access-control-allow-origin")).toBe("*");
      expect(await missing.json()).toEqual({ error: "Not found" });
    });
  });

  it("reports health from the store", async () => {
    const healthy = await send("GET", "/health");
    expect(healthy.status).toBe(200);
    expect(await healthy.json()).toEqual({ status: "healthy" });

    vi.spyOn(store, "ping").mockRejectedValue(new Error("Connection refused"));
    const unhealthy = await send("GET", "/health");

    expect(unhealthy.status).toBe(503);
    expect(await unhealthy.json()).toEqual({
      status: "unhealthy",
      error: "Connection refused",
    });
  });
});
