import type Database from "better-sqlite3";
import type { Product } from "../models/product.js";
import { fromCents } from "../utils/money.js";

export interface ProductRow {
  product_id: number;
  name: string;
  description: string;
  unit_price_cents: number;
  quantity_on_hand: number;
  low_stock_threshold: number;
  image_path: string | null;
  created_at: string;
  updated_at: string;
}

export interface NewProductRow {
  name: string;
  description: string;
  unit_price_cents: number;
  quantity_on_hand: number;
  low_stock_threshold: number;
  created_at: string;
}

export interface ProductFilter {
  lowStockOnly?: boolean;
  search?: string;
}

export function toProduct(row: ProductRow): Product {
  return {
    product_id: row.product_id,
    name: row.name,
    description: row.description,
    unit_price: fromCents(row.unit_price_cents),
    quantity_on_hand: row.quantity_on_hand,
    low_stock_threshold: row.low_stock_threshold,
    image_path: row.image_path,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function findProductRow(db: Database.Database, productId: number): ProductRow | undefined {
  return db
    .prepare<[number], ProductRow>("SELECT * FROM products WHERE product_id = ?")
    .get(productId);
}

export function insertProduct(db: Database.Database, product: NewProductRow): number {
  const result = db
    .prepare<[string, string, number, number, number, string, string]>(`
      INSERT INTO products (
        name, description, unit_price_cents, quantity_on_hand,
        low_stock_threshold, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?)
    `)
    .run(
      product.name,
      product.description,
      product.unit_price_cents,
      product.quantity_on_hand,
      product.low_stock_threshold,
      product.created_at,
      product.created_at,
    );
  return Number(result.lastInsertRowid);
}

export type ProductFieldChanges = Partial<
  Pick<ProductRow, "name" | "description" | "unit_price_cents" | "low_stock_threshold" | "image_path">
>;

export function updateProductFields(
  db: Database.Database,
  productId: number,
  changes: ProductFieldChanges,
  updatedAt: string,
): boolean {
  const assignments: string[] = [];
  const values: Array<string | number | null> = [];

  for (const [column, value] of Object.entries(changes)) {
    if (value !== undefined) {
      assignments.push(`${column} = ?`);
      values.push(value);
    }
  }

  assignments.push("updated_at = ?");
  values.push(updatedAt, productId);

  const result = db
    .prepare<Array<string | number | null>>(
      `UPDATE products SET ${assignments.join(", ")} WHERE product_id = ?`,
    )
    .run(...values);
  return result.changes > 0;
}

/**
 * Compare-and-swap decrement: only applies while enough stock remains, so a
 * stale read can never push the quantity below zero.
 */
export function decrementStock(
  db: Database.Database,
  productId: number,
  quantity: number,
  updatedAt: string,
): boolean {
  const result = db
    .prepare<[number, string, number, number]>(`
      UPDATE products
      SET quantity_on_hand = quantity_on_hand - ?, updated_at = ?
      WHERE product_id = ? AND quantity_on_hand >= ?
    `)
    .run(quantity, updatedAt, productId, quantity);
  return result.changes > 0;
}

export function incrementStock(
  db: Database.Database,
  productId: number,
  quantity: number,
  updatedAt: string,
): boolean {
  const result = db
    .prepare<[number, string, number]>(`
      UPDATE products
      SET quantity_on_hand = quantity_on_hand + ?, updated_at = ?
      WHERE product_id = ?
    `)
    .run(quantity, updatedAt, productId);
  return result.changes > 0;
}

export function setStock(
  db: Database.Database,
  productId: number,
  quantity: number,
  updatedAt: string,
): boolean {
  const result = db
    .prepare<[number, string, number]>(
      "UPDATE products SET quantity_on_hand = ?, updated_at = ? WHERE product_id = ?",
    )
    .run(quantity, updatedAt, productId);
  return result.changes > 0;
}

export function deleteProductRow(db: Database.Database, productId: number): boolean {
  const result = db
    .prepare<[number]>("DELETE FROM products WHERE product_id = ?")
    .run(productId);
  return result.changes > 0;
}

export function countSaleLinesForProduct(db: Database.Database, productId: number): number {
  const row = db
    .prepare<[number], { count: number }>(
      "SELECT COUNT(*) AS count FROM sale_lines WHERE product_id = ?",
    )
    .get(productId);
  return row?.count ?? 0;
}

function filterClause(filter: ProductFilter): { where: string; params: string[] } {
  const conditions: string[] = [];
  const params: string[] = [];

  if (filter.lowStockOnly) {
    conditions.push("quantity_on_hand <= low_stock_threshold");
  }
  if (filter.search) {
    conditions.push("name LIKE ? ESCAPE '\\'");
    params.push(`%${filter.search.replace(/[\\%_]/g, (char) => `\\${char}`)}%`);
  }

  return {
    where: conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "",
    params,
  };
}

export function listProductRows(
  db: Database.Database,
  filter: ProductFilter,
  limit: number,
  offset: number,
): ProductRow[] {
  const { where, params } = filterClause(filter);
  return db
    .prepare<Array<string | number>, ProductRow>(`
      SELECT * FROM products ${where}
      ORDER BY name COLLATE NOCASE ASC, product_id ASC
      LIMIT ? OFFSET ?
    `)
    .all(...params, limit, offset);
}

export function countProducts(db: Database.Database, filter: ProductFilter): number {
  const { where, params } = filterClause(filter);
  const row = db
    .prepare<string[], { count: number }>(`SELECT COUNT(*) AS count FROM products ${where}`)
    .get(...params);
  return row?.count ?? 0;
}

export function listLowStockRows(db: Database.Database, limit?: number): ProductRow[] {
  const sql = `
    SELECT * FROM products
    WHERE quantity_on_hand <= low_stock_threshold
    ORDER BY quantity_on_hand ASC, product_id ASC
  `;
  return limit === undefined
    ? db.prepare<[], ProductRow>(sql).all()
    : db.prepare<[number], ProductRow>(`${sql} LIMIT ?`).all(limit);
}
