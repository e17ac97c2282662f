import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import type { Server } from "http";
import type Database from "better-sqlite3";
import { z } from "zod";
import { createApp } from "../../src/http/app.js";
import { loadConfig } from "../../src/config/env.js";
import { ProductSchema } from "../../src/models/product.js";
import { CustomerSchema } from "../../src/models/customer.js";
import { SaleSchema } from "../../src/models/sale.js";
import { createTestDatabase, testClock } from "../helpers.js";

const ErrorResponseSchema = z.object({
  error: z.string(),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
});

const ProductResponseSchema = z.object({ product: ProductSchema });
const ProductDetailResponseSchema = z.object({
  product: ProductSchema.extend({ is_low_stock: z.boolean() }),
});
const CustomerResponseSchema = z.object({ customer: CustomerSchema });
const SaleResponseSchema = z.object({ sale: SaleSchema });

interface CallOptions {
  actor?: string;
  roles?: string;
  body?: unknown;
}

const CLERK = { actor: "clerk-1", roles: "stock" };
const SELLER = { actor: "seller-1", roles: "seller" };

describe("HTTP API", () => {
  let dir: string;
  let db: Database.Database;
  let server: Server;
  let baseUrl: string;

  async function start(env: Record<string, string> = {}): Promise<void> {
    const config = loadConfig({
      NODE_ENV: "test",
      UPLOAD_DIR: path.join(dir, "uploads"),
      RATE_LIMIT_MAX_WRITES: "1000",
      ...env,
    });
    const app = createApp({ db, config, now: testClock("2024-07-10T12:00:00.000Z").now });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  async function call(method: string, route: string, options: CallOptions = {}) {
    const headers: Record<string, string> = {};
    if (options.actor) {
      headers["x-actor"] = options.actor;
    }
    if (options.roles) {
      headers["x-actor-roles"] = options.roles;
    }
    if (options.body !== undefined) {
      headers["content-type"] = "application/json";
    }

    const response = await fetch(`${baseUrl}${route}`, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    const body: unknown = await response.json();
    return { status: response.status, body };
  }

  async function createProduct(quantity: number) {
    const { status, body } = await call("POST", "/api/products", {
      ...CLERK,
      body: { name: "Lamp", unit_price: 12.5, quantity_on_hand: quantity, low_stock_threshold: 2 },
    });
    expect(status).toBe(201);
    return ProductResponseSchema.parse(body).product;
  }

  async function createCustomer() {
    const { status, body } = await call("POST", "/api/customers", {
      ...SELLER,
      body: { first_name: "Marta", last_name: "Ruiz" },
    });
    expect(status).toBe(201);
    return CustomerResponseSchema.parse(body).customer;
  }

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "stockroom-api-"));
    db = createTestDatabase();
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  test("should report health", async () => {
    await start();
    const { status, body } = await call("GET", "/health");

    expect(status).toBe(200);
    expect(body).toEqual({ status: "ok", timestamp: "2024-07-10T12:00:00.000Z" });
  });

  test("should require an actor", async () => {
    await start();
    const { status, body } = await call("GET", "/api/products");

    expect(status).toBe(401);
    expect(ErrorResponseSchema.parse(body).error).toBe("UNAUTHENTICATED");
  });

  test("should refuse catalog changes from sellers", async () => {
    await start();
    const { status, body } = await call("POST", "/api/products", {
      ...SELLER,
      body: { name: "Lamp", unit_price: 1 },
    });

    expect(status).toBe(403);
    expect(ErrorResponseSchema.parse(body)).toEqual({
      error: "FORBIDDEN",
      message: "User seller-1 is not allowed to perform catalog:write",
      details: { username: "seller-1", permission: "catalog:write" },
    });
  });

  test("should reject invalid bodies and malformed JSON", async () => {
    await start();
    const invalid = await call("POST", "/api/products", {
      ...CLERK,
      body: { name: "Lamp", unit_price: "cheap" },
    });
    expect(invalid.status).toBe(400);
    expect(ErrorResponseSchema.parse(invalid.body).error).toBe("VALIDATION_FAILED");

    const response = await fetch(`${baseUrl}/api/products`, {
      method: "POST",
      headers: { "content-type": "application/json", "x-actor": "clerk-1", "x-actor-roles": "stock" },
      body: "{not json",
    });
    expect(response.status).toBe(400);
    expect(ErrorResponseSchema.parse(await response.json()).error).toBe("BAD_REQUEST");
  });

  test("should answer unknown routes with 404", async () => {
    await start();
    const { status, body } = await call("GET", "/api/nowhere", SELLER);

    expect(status).toBe(404);
    expect(body).toEqual({ error: "NOT_FOUND", message: "No route for GET /api/nowhere" });
  });

  test("should record a sale, refuse overselling and restore stock on deletion", async () => {
    await start();
    const product = await createProduct(3);
    const customer = await createCustomer();

    const oversold = await call("POST", "/api/sales", {
      ...SELLER,
      body: {
        customer_id: customer.customer_id,
        lines: [{ product_id: product.product_id, quantity: 5 }],
      },
    });
    expect(oversold.status).toBe(409);
    expect(ErrorResponseSchema.parse(oversold.body)).toEqual({
      error: "INSUFFICIENT_STOCK",
      message: "Only 3 units of Lamp available, 5 requested",
      details: { productId: product.product_id, productName: "Lamp", available: 3, requested: 5 },
    });

    const recorded = await call("POST", "/api/sales", {
      ...SELLER,
      body: {
        customer_id: customer.customer_id,
        lines: [{ product_id: product.product_id, quantity: 2 }],
      },
    });
    expect(recorded.status).toBe(201);
    const sale = SaleResponseSchema.parse(recorded.body).sale;
    expect(sale.code).toBe("VNT-000001");
    expect(sale.total).toBe(25);
    expect(sale.customer_name).toBe("Marta Ruiz");

    const detail = await call("GET", `/api/products/${product.product_id}`, SELLER);
    const afterSale = ProductDetailResponseSchema.parse(detail.body).product;
    expect(afterSale.quantity_on_hand).toBe(1);
    expect(afterSale.is_low_stock).toBe(true);

    const listed = await call("GET", "/api/sales?page_size=5", SELLER);
    expect(listed.status).toBe(200);
    expect(listed.body).toEqual({
      sales: [
        {
          sale_id: 1,
          code: "VNT-000001",
          customer_id: customer.customer_id,
          customer_name: "Marta Ruiz",
          total: 25,
          created_at: "2024-07-10T12:00:00.000Z",
          line_count: 1,
        },
      ],
      pagination: { page: 1, page_size: 5, total: 1, total_pages: 1 },
    });

    const deleted = await call("DELETE", "/api/sales/1", SELLER);
    expect(deleted.body).toEqual({ success: true, saleId: 1, code: "VNT-000001" });

    const restored = await call("GET", `/api/products/${product.product_id}`, SELLER);
    expect(ProductDetailResponseSchema.parse(restored.body).product.quantity_on_hand).toBe(3);
  });

  test("should report statistics for a trailing window or a day range", async () => {
    await start();
    const product = await createProduct(5);
    const customer = await createCustomer();
    await call("POST", "/api/sales", {
      ...SELLER,
      body: {
        customer_id: customer.customer_id,
        lines: [{ product_id: product.product_id, quantity: 2 }],
      },
    });

    const ranged = await call("GET", "/api/sales/statistics?from=2024-07-01&to=2024-07-10", SELLER);
    expect(ranged.status).toBe(200);
    expect(ranged.body).toMatchObject({
      days: null,
      since: null,
      from: "2024-07-01",
      to: "2024-07-10",
      by_day: [{ period: "2024-07-10", count: 1, total: 25 }],
      period: { count: 1, total: 25, average: 25 },
    });

    const outside = await call("GET", "/api/sales/statistics?to=2024-07-09", SELLER);
    expect(outside.body).toMatchObject({ by_day: [], period: { count: 0, total: 0, average: 0 } });

    const trailing = await call("GET", "/api/sales/statistics", SELLER);
    expect(trailing.body).toMatchObject({
      days: 30,
      since: "2024-06-10T12:00:00.000Z",
      from: null,
      to: null,
    });
  });

  test("should refuse mixing days with a range or an inverted range", async () => {
    await start();

    const mixed = await call("GET", "/api/sales/statistics?days=7&from=2024-07-01", SELLER);
    expect(mixed.status).toBe(400);
    expect(ErrorResponseSchema.parse(mixed.body).error).toBe("VALIDATION_FAILED");

    const inverted = await call("GET", "/api/sales/statistics?from=2024-07-10&to=2024-07-01", SELLER);
    expect(inverted.status).toBe(400);
  });

  test("should adjust stock through the ledger", async () => {
    await start();
    const product = await createProduct(4);

    const { status, body } = await call("PUT", `/api/products/${product.product_id}/stock`, {
      ...CLERK,
      body: { quantity: 9, reason: "Recount" },
    });

    expect(status).toBe(200);
    expect(body).toEqual({
      product: { ...product, quantity_on_hand: 9 },
      movement: {
        movement_id: 2,
        product_id: product.product_id,
        kind: "in",
        quantity: 5,
        reason: "Recount",
        actor: "clerk-1",
        created_at: "2024-07-10T12:00:00.000Z",
      },
    });
  });

  test("should store an uploaded product image", async () => {
    await start();
    const product = await createProduct(1);

    const form = new FormData();
    form.append("image", new Blob([new Uint8Array([137, 80, 78, 71])], { type: "image/png" }), "lamp.png");
    const response = await fetch(`${baseUrl}/api/products/${product.product_id}/image`, {
      method: "POST",
      headers: { "x-actor": "clerk-1", "x-actor-roles": "stock" },
      body: form,
    });

    expect(response.status).toBe(201);
    const stored = ProductResponseSchema.parse(await response.json()).product;
    expect(stored.image_path).toMatch(/^[0-9a-f-]{36}\.png$/);

    const served = await fetch(`${baseUrl}/uploads/${stored.image_path}`);
    expect(served.status).toBe(200);
    expect(new Uint8Array(await served.arrayBuffer())).toEqual(new Uint8Array([137, 80, 78, 71]));
  });

  test("should reject uploads that are not images", async () => {
    await start();
    const product = await createProduct(1);

    const form = new FormData();
    form.append("image", new Blob(["hello"], { type: "text/plain" }), "notes.txt");
    const response = await fetch(`${baseUrl}/api/products/${product.product_id}/image`, {
      method: "POST",
      headers: { "x-actor": "clerk-1", "x-actor-roles": "stock" },
      body: form,
    });

    expect(response.status).toBe(400);
    expect(ErrorResponseSchema.parse(await response.json()).error).toBe("VALIDATION_FAILED");
  });

  test("should rate limit writes per actor", async () => {
    await start({ RATE_LIMIT_MAX_WRITES: "1" });
    await createCustomer();

    const { status, body } = await call("POST", "/api/customers", {
      ...SELLER,
      body: { first_name: "Second", last_name: "Try" },
    });

    expect(status).toBe(429);
    expect(ErrorResponseSchema.parse(body).error).toBe("RATE_LIMITED");
  });
});
