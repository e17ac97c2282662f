import type Database from "better-sqlite3";
import type { Customer } from "../models/customer.js";

interface CustomerRow {
  customer_id: number;
  first_name: string;
  last_name: string;
  email: string | null;
  phone: string | null;
  address: string | null;
  created_at: string;
}

export interface NewCustomerRow {
  first_name: string;
  last_name: string;
  email: string | null;
  phone: string | null;
  address: string | null;
  created_at: string;
}

export type CustomerFieldChanges = Partial<
  Pick<CustomerRow, "first_name" | "last_name" | "email" | "phone" | "address">
>;

function toCustomer(row: CustomerRow): Customer {
  return { ...row };
}

export function findCustomer(db: Database.Database, customerId: number): Customer | null {
  const row = db
    .prepare<[number], CustomerRow>("SELECT * FROM customers WHERE customer_id = ?")
    .get(customerId);
  return row ? toCustomer(row) : null;
}

export function insertCustomer(db: Database.Database, customer: NewCustomerRow): number {
  const result = db
    .prepare<[string, string, string | null, string | null, string | null, string]>(`
      INSERT INTO customers (first_name, last_name, email, phone, address, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `)
    .run(
      customer.first_name,
      customer.last_name,
      customer.email,
      customer.phone,
      customer.address,
      customer.created_at,
    );
  return Number(result.lastInsertRowid);
}

export function updateCustomerFields(
  db: Database.Database,
  customerId: number,
  changes: CustomerFieldChanges,
): boolean {
  const assignments: string[] = [];
  const values: Array<string | number | null> = [];

  for (const [column, value] of Object.entries(changes)) {
    if (value !== undefined) {
      assignments.push(`${column} = ?`);
      values.push(value);
    }
  }

  if (assignments.length === 0) {
    return findCustomer(db, customerId) !== null;
  }

  values.push(customerId);
  const result = db
    .prepare<Array<string | number | null>>(
      `UPDATE customers SET ${assignments.join(", ")} WHERE customer_id = ?`,
    )
    .run(...values);
  return result.changes > 0;
}

export function deleteCustomerRow(db: Database.Database, customerId: number): boolean {
  const result = db
    .prepare<[number]>("DELETE FROM customers WHERE customer_id = ?")
    .run(customerId);
  return result.changes > 0;
}

export function countSalesForCustomer(db: Database.Database, customerId: number): number {
  const row = db
    .prepare<[number], { count: number }>(
      "SELECT COUNT(*) AS count FROM sales WHERE customer_id = ?",
    )
    .get(customerId);
  return row?.count ?? 0;
}

export function listCustomers(db: Database.Database, limit: number, offset: number): Customer[] {
  return db
    .prepare<[number, number], CustomerRow>(`
      SELECT * FROM customers
      ORDER BY last_name COLLATE NOCASE ASC, first_name COLLATE NOCASE ASC, customer_id ASC
      LIMIT ? OFFSET ?
    `)
    .all(limit, offset)
    .map(toCustomer);
}

export function countCustomers(db: Database.Database): number {
  const row = db
    .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM customers")
    .get();
  return row?.count ?? 0;
}
