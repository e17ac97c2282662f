import type Database from "better-sqlite3";
import type { Actor } from "../src/auth/actor.js";
import { createDatabase } from "../src/database/index.js";
import { ProductCatalog } from "../src/catalog/product-catalog.js";
import { CustomerDirectory } from "../src/customers/customer-directory.js";
import type { CreateProductInput, Product } from "../src/models/product.js";
import type { Customer } from "../src/models/customer.js";

export const ADMIN: Actor = { username: "admin", roles: ["admin"] };
export const SELLER: Actor = { username: "seller-1", roles: ["seller"] };
export const STOCK_CLERK: Actor = { username: "clerk-1", roles: ["stock"] };

export interface TestClock {
  now: () => Date;
  set: (iso: string) => void;
}

export function testClock(iso: string): TestClock {
  let current = new Date(iso);
  return {
    now: () => current,
    set: (next: string) => {
      current = new Date(next);
    },
  };
}

// Seeds default to a fixed instant so no seeded row sorts after test activity
export const SEED_TIME = "2024-01-01T00:00:00.000Z";

export function createTestDatabase(): Database.Database {
  return createDatabase({ path: ":memory:" });
}

export function seedProduct(
  db: Database.Database,
  overrides: Partial<CreateProductInput> = {},
  clock?: TestClock,
): Product {
  const catalog = new ProductCatalog(db, { now: (clock ?? testClock(SEED_TIME)).now });
  return catalog.createProduct(ADMIN, {
    name: "Widget",
    description: "",
    unit_price: 10,
    quantity_on_hand: 10,
    low_stock_threshold: 5,
    ...overrides,
  });
}

export function seedCustomer(
  db: Database.Database,
  firstName = "Ana",
  lastName = "Gomez",
): Customer {
  return new CustomerDirectory(db, { now: testClock(SEED_TIME).now }).createCustomer(ADMIN, {
    first_name: firstName,
    last_name: lastName,
  });
}

export function quantityOf(db: Database.Database, productId: number): number | undefined {
  return db
    .prepare<[number], { quantity_on_hand: number }>(
      "SELECT quantity_on_hand FROM products WHERE product_id = ?",
    )
    .get(productId)?.quantity_on_hand;
}

export function countRows(db: Database.Database, table: "sales" | "sale_lines" | "stock_movements"): number {
  return (
    db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0
  );
}
