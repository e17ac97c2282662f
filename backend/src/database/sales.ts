import type Database from "better-sqlite3";
import { formatSaleCode, type Sale, type SaleLine, type SaleSummary } from "../models/sale.js";
import { fromCents } from "../utils/money.js";

interface SaleHeaderRow {
  sale_id: number;
  customer_id: number;
  first_name: string;
  last_name: string;
  total_cents: number;
  created_at: string;
}

interface SaleSummaryRow extends SaleHeaderRow {
  line_count: number;
}

export interface SaleLineRow {
  line_id: number;
  position: number;
  product_id: number;
  product_name: string;
  quantity: number;
  unit_price_cents: number;
  subtotal_cents: number;
}

export interface NewSaleLine {
  sale_id: number;
  position: number;
  product_id: number;
  quantity: number;
  unit_price_cents: number;
  subtotal_cents: number;
}

/** `from`/`to` are inclusive calendar days; `since` is an inclusive ISO timestamp. */
export interface SaleDateRange {
  from?: string;
  to?: string;
  since?: string;
}

const SALE_HEADER_SELECT = `
  SELECT s.sale_id, s.customer_id, c.first_name, c.last_name, s.total_cents, s.created_at
  FROM sales s
  JOIN customers c ON c.customer_id = s.customer_id
`;

function toSaleLine(row: SaleLineRow): SaleLine {
  return {
    line_id: row.line_id,
    position: row.position,
    product_id: row.product_id,
    product_name: row.product_name,
    quantity: row.quantity,
    unit_price: fromCents(row.unit_price_cents),
    subtotal: fromCents(row.subtotal_cents),
  };
}

function toSaleSummary(row: SaleSummaryRow): SaleSummary {
  return {
    sale_id: row.sale_id,
    code: formatSaleCode(row.sale_id),
    customer_id: row.customer_id,
    customer_name: `${row.first_name} ${row.last_name}`,
    total: fromCents(row.total_cents),
    created_at: row.created_at,
    line_count: row.line_count,
  };
}

export function insertSale(db: Database.Database, customerId: number, createdAt: string): number {
  const result = db
    .prepare<[number, string]>("INSERT INTO sales (customer_id, total_cents, created_at) VALUES (?, 0, ?)")
    .run(customerId, createdAt);
  return Number(result.lastInsertRowid);
}

export function insertSaleLine(db: Database.Database, line: NewSaleLine): number {
  const result = db
    .prepare<[number, number, number, number, number, number]>(`
      INSERT INTO sale_lines (
        sale_id, position, product_id, quantity, unit_price_cents, subtotal_cents
      ) VALUES (?, ?, ?, ?, ?, ?)
    `)
    .run(
      line.sale_id,
      line.position,
      line.product_id,
      line.quantity,
      line.unit_price_cents,
      line.subtotal_cents,
    );
  return Number(result.lastInsertRowid);
}

export function setSaleTotal(db: Database.Database, saleId: number, totalCents: number): void {
  db.prepare<[number, number]>("UPDATE sales SET total_cents = ? WHERE sale_id = ?").run(
    totalCents,
    saleId,
  );
}

export function findSaleLineRows(db: Database.Database, saleId: number): SaleLineRow[] {
  return db
    .prepare<[number], SaleLineRow>(`
      SELECT l.line_id, l.position, l.product_id, p.name AS product_name,
             l.quantity, l.unit_price_cents, l.subtotal_cents
      FROM sale_lines l
      JOIN products p ON p.product_id = l.product_id
      WHERE l.sale_id = ?
      ORDER BY l.position ASC
    `)
    .all(saleId);
}

export function findSale(db: Database.Database, saleId: number): Sale | null {
  const header = db
    .prepare<[number], SaleHeaderRow>(`${SALE_HEADER_SELECT} WHERE s.sale_id = ?`)
    .get(saleId);

  if (!header) {
    return null;
  }

  return {
    sale_id: header.sale_id,
    code: formatSaleCode(header.sale_id),
    customer_id: header.customer_id,
    customer_name: `${header.first_name} ${header.last_name}`,
    total: fromCents(header.total_cents),
    created_at: header.created_at,
    lines: findSaleLineRows(db, saleId).map(toSaleLine),
  };
}

export function deleteSaleRow(db: Database.Database, saleId: number): boolean {
  const result = db.prepare<[number]>("DELETE FROM sales WHERE sale_id = ?").run(saleId);
  return result.changes > 0;
}

function rangeClause(range: SaleDateRange): { where: string; params: string[] } {
  const conditions: string[] = [];
  const params: string[] = [];

  if (range.from) {
    conditions.push("substr(s.created_at, 1, 10) >= ?");
    params.push(range.from);
  }
  if (range.to) {
    conditions.push("substr(s.created_at, 1, 10) <= ?");
    params.push(range.to);
  }
  if (range.since) {
    conditions.push("s.created_at >= ?");
    params.push(range.since);
  }

  return {
    where: conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "",
    params,
  };
}

export function listSaleSummaries(
  db: Database.Database,
  range: SaleDateRange,
  limit: number,
  offset: number,
): SaleSummary[] {
  const { where, params } = rangeClause(range);
  return db
    .prepare<Array<string | number>, SaleSummaryRow>(`
      SELECT s.sale_id, s.customer_id, c.first_name, c.last_name, s.total_cents, s.created_at,
             (SELECT COUNT(*) FROM sale_lines l WHERE l.sale_id = s.sale_id) AS line_count
      FROM sales s
      JOIN customers c ON c.customer_id = s.customer_id
      ${where}
      ORDER BY s.created_at DESC, s.sale_id DESC
      LIMIT ? OFFSET ?
    `)
    .all(...params, limit, offset)
    .map(toSaleSummary);
}

export function countSales(db: Database.Database, range: SaleDateRange): number {
  const { where, params } = rangeClause(range);
  const row = db
    .prepare<string[], { count: number }>(`SELECT COUNT(*) AS count FROM sales s ${where}`)
    .get(...params);
  return row?.count ?? 0;
}

export interface SalesAggregateRow {
  count: number;
  total_cents: number;
}

export function aggregateSales(db: Database.Database, range: SaleDateRange): SalesAggregateRow {
  const { where, params } = rangeClause(range);
  const row = db
    .prepare<string[], SalesAggregateRow>(`
      SELECT COUNT(*) AS count, COALESCE(SUM(s.total_cents), 0) AS total_cents
      FROM sales s ${where}
    `)
    .get(...params);
  return row ?? { count: 0, total_cents: 0 };
}

export interface SalesBucketRow {
  bucket: string;
  count: number;
  total_cents: number;
}

/** Groups sales in the range by the first `prefixLength` characters of the timestamp. */
export function salesByPeriod(
  db: Database.Database,
  range: SaleDateRange,
  prefixLength: 7 | 10,
): SalesBucketRow[] {
  const { where, params } = rangeClause(range);
  return db
    .prepare<string[], SalesBucketRow>(`
      SELECT substr(s.created_at, 1, ${prefixLength}) AS bucket,
             COUNT(*) AS count,
             SUM(s.total_cents) AS total_cents
      FROM sales s
      ${where}
      GROUP BY bucket
      ORDER BY bucket ASC
    `)
    .all(...params);
}

export interface TopProductRow {
  product_id: number;
  name: string;
  units_sold: number;
  revenue_cents: number;
}

export function topProducts(db: Database.Database, range: SaleDateRange, limit: number): TopProductRow[] {
  const { where, params } = rangeClause(range);
  return db
    .prepare<Array<string | number>, TopProductRow>(`
      SELECT p.product_id, p.name,
             SUM(l.quantity) AS units_sold,
             SUM(l.subtotal_cents) AS revenue_cents
      FROM sale_lines l
      JOIN sales s ON s.sale_id = l.sale_id
      JOIN products p ON p.product_id = l.product_id
      ${where}
      GROUP BY p.product_id
      ORDER BY units_sold DESC, p.product_id ASC
      LIMIT ?
    `)
    .all(...params, limit);
}

export interface TopCustomerRow {
  customer_id: number;
  first_name: string;
  last_name: string;
  purchases: number;
  spent_cents: number;
}

export function topCustomers(db: Database.Database, range: SaleDateRange, limit: number): TopCustomerRow[] {
  const { where, params } = rangeClause(range);
  return db
    .prepare<Array<string | number>, TopCustomerRow>(`
      SELECT c.customer_id, c.first_name, c.last_name,
             COUNT(*) AS purchases,
             SUM(s.total_cents) AS spent_cents
      FROM sales s
      JOIN customers c ON c.customer_id = s.customer_id
      ${where}
      GROUP BY c.customer_id
      ORDER BY spent_cents DESC, c.customer_id ASC
      LIMIT ?
    `)
    .all(...params, limit);
}
