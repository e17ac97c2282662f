import { z } from "zod";

export const MovementKindSchema = z.enum(["in", "out"]);

export const StockMovementSchema = z.object({
  movement_id: z.number().int().positive(),
  product_id: z.number().int().positive(),
  kind: MovementKindSchema,
  quantity: z.number().int().positive(),
  reason: z.string(),
  actor: z.string(),
  created_at: z.string().datetime(),
});

// Quantities are range-checked by the ledger so callers get InvalidQuantity
// rather than a generic validation failure.
export const RegisterMovementInputSchema = z.object({
  kind: MovementKindSchema,
  quantity: z.number(),
  reason: z.string().trim().max(200).optional(),
});

export const AdjustStockInputSchema = z.object({
  quantity: z.number(),
  reason: z.string().trim().max(200).optional(),
});

export type MovementKind = z.infer<typeof MovementKindSchema>;
export type StockMovement = z.infer<typeof StockMovementSchema>;
export type RegisterMovementInput = z.infer<typeof RegisterMovementInputSchema>;
export type AdjustStockInput = z.infer<typeof AdjustStockInputSchema>;
