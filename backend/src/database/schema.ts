import Database from "better-sqlite3";
import { getConfig } from "../config/env.js";
import { logger } from "../logger.js";
import { dirname } from "path";
import { existsSync, mkdirSync } from "fs";

export function initializeDatabase(db: Database.Database): void {
  logger.debug("Initializing database schema");

  db.exec(`
    CREATE TABLE IF NOT EXISTS products (
      product_id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      unit_price_cents INTEGER NOT NULL CHECK (unit_price_cents >= 0),
      quantity_on_hand INTEGER NOT NULL DEFAULT 0 CHECK (quantity_on_hand >= 0),
      low_stock_threshold INTEGER NOT NULL DEFAULT 5 CHECK (low_stock_threshold >= 0),
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS customers (
      customer_id INTEGER PRIMARY KEY AUTOINCREMENT,
      first_name TEXT NOT NULL,
      last_name TEXT NOT NULL,
      email TEXT,
      phone TEXT,
      address TEXT,
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS sales (
      sale_id INTEGER PRIMARY KEY AUTOINCREMENT,
      customer_id INTEGER NOT NULL REFERENCES customers(customer_id) ON DELETE RESTRICT,
      total_cents INTEGER NOT NULL DEFAULT 0 CHECK (total_cents >= 0),
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS sale_lines (
      line_id INTEGER PRIMARY KEY AUTOINCREMENT,
      sale_id INTEGER NOT NULL REFERENCES sales(sale_id) ON DELETE CASCADE,
      position INTEGER NOT NULL,
      product_id INTEGER NOT NULL REFERENCES products(product_id) ON DELETE RESTRICT,
      quantity INTEGER NOT NULL CHECK (quantity > 0),
      unit_price_cents INTEGER NOT NULL CHECK (unit_price_cents >= 0),
      subtotal_cents INTEGER NOT NULL CHECK (subtotal_cents >= 0),
      UNIQUE (sale_id, position)
    );

    CREATE TABLE IF NOT EXISTS stock_movements (
      movement_id INTEGER PRIMARY KEY AUTOINCREMENT,
      product_id INTEGER NOT NULL REFERENCES products(product_id) ON DELETE CASCADE,
      kind TEXT NOT NULL CHECK (kind IN ('in', 'out')),
      quantity INTEGER NOT NULL CHECK (quantity > 0),
      reason TEXT NOT NULL,
      actor TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_products_name ON products(name);
    CREATE INDEX IF NOT EXISTS idx_sales_created_at ON sales(created_at);
    CREATE INDEX IF NOT EXISTS idx_sales_customer ON sales(customer_id);
    CREATE INDEX IF NOT EXISTS idx_sale_lines_sale ON sale_lines(sale_id);
    CREATE INDEX IF NOT EXISTS idx_sale_lines_product ON sale_lines(product_id);
    CREATE INDEX IF NOT EXISTS idx_movements_product ON stock_movements(product_id, created_at);
  `);

  // Databases created before image uploads existed lack the column
  const productColumns = db
    .prepare<[], { name: string }>("PRAGMA table_info(products)")
    .all()
    .map((column) => column.name);

  if (!productColumns.includes("image_path")) {
    db.exec("ALTER TABLE products ADD COLUMN image_path TEXT");
    logger.debug("Added image_path column to products table");
  }

  logger.debug("Database schema initialized");
}

export interface DatabaseOptions {
  path?: string;
  busyTimeoutMs?: number;
}

export function createDatabase(options: DatabaseOptions = {}): Database.Database {
  const config = getConfig();
  const databasePath = options.path ?? config.databasePath;
  const timeout = options.busyTimeoutMs ?? config.databaseBusyTimeoutMs;

  if (databasePath !== ":memory:") {
    const dir = dirname(databasePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(databasePath, { timeout });
  db.pragma("foreign_keys = ON");
  if (databasePath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  initializeDatabase(db);
  return db;
}
