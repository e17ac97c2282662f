import type Database from "better-sqlite3";
import type { MovementKind, StockMovement } from "../models/movement.js";

interface MovementRow {
  movement_id: number;
  product_id: number;
  kind: string;
  quantity: number;
  reason: string;
  actor: string;
  created_at: string;
}

export interface NewMovement {
  product_id: number;
  kind: MovementKind;
  quantity: number;
  reason: string;
  actor: string;
  created_at: string;
}

function toMovement(row: MovementRow): StockMovement {
  return {
    movement_id: row.movement_id,
    product_id: row.product_id,
    // The table CHECK constraint limits kind to these two values
    kind: row.kind === "out" ? "out" : "in",
    quantity: row.quantity,
    reason: row.reason,
    actor: row.actor,
    created_at: row.created_at,
  };
}

export function insertMovement(db: Database.Database, movement: NewMovement): number {
  const result = db
    .prepare<[number, string, number, string, string, string]>(`
      INSERT INTO stock_movements (product_id, kind, quantity, reason, actor, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `)
    .run(
      movement.product_id,
      movement.kind,
      movement.quantity,
      movement.reason,
      movement.actor,
      movement.created_at,
    );
  return Number(result.lastInsertRowid);
}

export function recentMovements(
  db: Database.Database,
  productId: number,
  limit: number,
): StockMovement[] {
  return db
    .prepare<[number, number], MovementRow>(`
      SELECT * FROM stock_movements
      WHERE product_id = ?
      ORDER BY created_at DESC, movement_id DESC
      LIMIT ?
    `)
    .all(productId, limit)
    .map(toMovement);
}
