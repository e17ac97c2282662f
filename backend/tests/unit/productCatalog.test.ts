import { describe, test, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { ProductCatalog } from "../../src/catalog/product-catalog.js";
import { StockLedger } from "../../src/ledger/stock-ledger.js";
import {
  ForbiddenError,
  ProductInUseError,
  UnknownProductError,
  ValidationError,
} from "../../src/errors.js";
import { MAX_UNIT_PRICE } from "../../src/models/product.js";
import {
  ADMIN,
  SELLER,
  STOCK_CLERK,
  countRows,
  createTestDatabase,
  seedCustomer,
  testClock,
  type TestClock,
} from "../helpers.js";

describe("ProductCatalog", () => {
  let db: Database.Database;
  let clock: TestClock;
  let catalog: ProductCatalog;

  beforeEach(() => {
    db = createTestDatabase();
    clock = testClock("2024-05-01T08:30:00.000Z");
    catalog = new ProductCatalog(db, { now: clock.now });
  });

  afterEach(() => {
    db.close();
  });

  const create = (name: string, quantity = 0, threshold = 5) =>
    catalog.createProduct(STOCK_CLERK, {
      name,
      description: `${name} description`,
      unit_price: 4.75,
      quantity_on_hand: quantity,
      low_stock_threshold: threshold,
    });

  describe("createProduct", () => {
    test("should store the product with an initial stock movement", () => {
      const product = create("Notebook", 12);

      expect(product).toEqual({
        product_id: 1,
        name: "Notebook",
        description: "Notebook description",
        unit_price: 4.75,
        quantity_on_hand: 12,
        low_stock_threshold: 5,
        image_path: null,
        created_at: "2024-05-01T08:30:00.000Z",
        updated_at: "2024-05-01T08:30:00.000Z",
      });

      const detail = catalog.getProduct(product.product_id);
      expect(detail.is_low_stock).toBe(false);
      expect(detail.movements).toEqual([
        {
          movement_id: 1,
          product_id: 1,
          kind: "in",
          quantity: 12,
          reason: "Initial stock",
          actor: "clerk-1",
          created_at: "2024-05-01T08:30:00.000Z",
        },
      ]);
    });

    test("should skip the movement when created without stock", () => {
      create("Empty");
      expect(countRows(db, "stock_movements")).toBe(0);
    });

    test.each([0.004, 1.999, MAX_UNIT_PRICE + 1])("should reject unit price %s", (unitPrice) => {
      expect(() =>
        catalog.createProduct(STOCK_CLERK, {
          name: "Eraser",
          description: "",
          unit_price: unitPrice,
          quantity_on_hand: 0,
          low_stock_threshold: 0,
        }),
      ).toThrow(ValidationError);
      expect(catalog.listProducts({}, { page: 1, pageSize: 10 }).total).toBe(0);
    });

    test("should reject an opening stock above the cap", () => {
      expect(() => create("Eraser", 2 ** 53)).toThrow(ValidationError);
    });

    test("should refuse sellers", () => {
      expect(() =>
        catalog.createProduct(SELLER, {
          name: "Nope",
          description: "",
          unit_price: 1,
          quantity_on_hand: 0,
          low_stock_threshold: 0,
        }),
      ).toThrow(ForbiddenError);
    });
  });

  describe("updateProduct", () => {
    test("should change only the provided fields", () => {
      const product = create("Notebook", 3);
      clock.set("2024-05-02T10:00:00.000Z");

      const updated = catalog.updateProduct(ADMIN, product.product_id, {
        unit_price: 5.1,
        low_stock_threshold: 2,
      });

      expect(updated.name).toBe("Notebook");
      expect(updated.unit_price).toBe(5.1);
      expect(updated.low_stock_threshold).toBe(2);
      expect(updated.quantity_on_hand).toBe(3);
      expect(updated.updated_at).toBe("2024-05-02T10:00:00.000Z");
      expect(updated.created_at).toBe("2024-05-01T08:30:00.000Z");
    });

    test("should not round a price update", () => {
      const product = create("Notebook");

      expect(() => catalog.updateProduct(ADMIN, product.product_id, { unit_price: 5.005 })).toThrow(
        ValidationError,
      );
      expect(catalog.getProduct(product.product_id).unit_price).toBe(4.75);
    });

    test("should reject an unknown product", () => {
      expect(() => catalog.updateProduct(ADMIN, 404, { name: "Ghost" })).toThrow(
        UnknownProductError,
      );
    });
  });

  describe("deleteProduct", () => {
    test("should delete a product and its movements", () => {
      const product = create("Notebook", 3);

      expect(catalog.deleteProduct(ADMIN, product.product_id).name).toBe("Notebook");
      expect(() => catalog.getProduct(product.product_id)).toThrow(UnknownProductError);
      expect(countRows(db, "stock_movements")).toBe(0);
    });

    test("should keep products that appear on sales", () => {
      const product = create("Notebook", 3);
      const customer = seedCustomer(db);
      new StockLedger(db).recordSale(SELLER, {
        customer_id: customer.customer_id,
        lines: [{ product_id: product.product_id, quantity: 1 }],
      });

      expect(() => catalog.deleteProduct(ADMIN, product.product_id)).toThrow(ProductInUseError);
      expect(catalog.getProduct(product.product_id).quantity_on_hand).toBe(2);
    });
  });

  describe("setProductImage", () => {
    test("should return the image it replaces", () => {
      const product = create("Notebook");

      expect(catalog.setProductImage(ADMIN, product.product_id, "first.png")).toBeNull();
      expect(catalog.setProductImage(ADMIN, product.product_id, "second.png")).toBe("first.png");
      expect(catalog.getProduct(product.product_id).image_path).toBe("second.png");
    });

    test("should reject an unknown product", () => {
      expect(() => catalog.setProductImage(ADMIN, 9, "x.png")).toThrow(UnknownProductError);
    });
  });

  describe("listProducts", () => {
    test("should paginate in name order", () => {
      create("cable");
      create("Battery");
      create("adapter");

      const firstPage = catalog.listProducts({}, { page: 1, pageSize: 2 });
      expect(firstPage.items.map((product) => product.name)).toEqual(["adapter", "Battery"]);
      expect(firstPage.total).toBe(3);
      expect(firstPage.total_pages).toBe(2);

      const secondPage = catalog.listProducts({}, { page: 2, pageSize: 2 });
      expect(secondPage.items.map((product) => product.name)).toEqual(["cable"]);
    });

    test("should filter by low stock and by name", () => {
      create("Red pen", 1, 5);
      create("Blue pen", 20, 5);
      create("Pencil 100%", 2, 1);

      expect(
        catalog.listProducts({ lowStockOnly: true }, { page: 1, pageSize: 10 }).items.map(
          (product) => product.name,
        ),
      ).toEqual(["Red pen"]);
      expect(
        catalog.listProducts({ search: "pen" }, { page: 1, pageSize: 10 }).items.map(
          (product) => product.name,
        ),
      ).toEqual(["Blue pen", "Pencil 100%", "Red pen"]);
      expect(
        catalog.listProducts({ search: "100%" }, { page: 1, pageSize: 10 }).total,
      ).toBe(1);
    });
  });
});
