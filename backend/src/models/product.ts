import { z } from "zod";

export const ProductSchema = z.object({
  product_id: z.number().int().positive(),
  name: z.string().min(1),
  description: z.string(),
  unit_price: z.number().nonnegative(),
  quantity_on_hand: z.number().int().nonnegative(),
  low_stock_threshold: z.number().int().nonnegative(),
  image_path: z.string().nullable(),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
});

export const DEFAULT_LOW_STOCK_THRESHOLD = 5;

// Caps keep quantities, cents and sale totals inside safe integer range.
export const MAX_STOCK_QUANTITY = 1_000_000;
export const MAX_UNIT_PRICE = 100_000;

const UnitPriceSchema = z
  .number()
  .nonnegative()
  .max(MAX_UNIT_PRICE)
  .multipleOf(0.01, "must have at most two decimal places");

const StockQuantitySchema = z.number().int().nonnegative().max(MAX_STOCK_QUANTITY);

export const CreateProductInputSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().trim().max(2000).default(""),
  unit_price: UnitPriceSchema,
  quantity_on_hand: StockQuantitySchema.default(0),
  low_stock_threshold: StockQuantitySchema.default(DEFAULT_LOW_STOCK_THRESHOLD),
});

// Quantity on hand is deliberately absent: it only moves through the ledger.
export const UpdateProductInputSchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    description: z.string().trim().max(2000),
    unit_price: UnitPriceSchema,
    low_stock_threshold: StockQuantitySchema,
  })
  .partial()
  .strict();

export const ProductListQuerySchema = z.object({
  page: z.coerce.number().int().positive().default(1),
  page_size: z.coerce.number().int().positive().max(100).optional(),
  low_stock: z
    .enum(["true", "false", "1", "0"])
    .transform((value) => value === "true" || value === "1")
    .optional(),
  search: z.string().trim().max(200).optional(),
});

export type Product = z.infer<typeof ProductSchema>;
export type CreateProductInput = z.infer<typeof CreateProductInputSchema>;
export type UpdateProductInput = z.infer<typeof UpdateProductInputSchema>;
export type ProductListQuery = z.infer<typeof ProductListQuerySchema>;

export function isLowStockLevel(
  product: Pick<Product, "quantity_on_hand" | "low_stock_threshold">,
): boolean {
  return product.quantity_on_hand <= product.low_stock_threshold;
}
