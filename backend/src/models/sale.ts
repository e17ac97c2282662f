import { z } from "zod";

export const SALE_CODE_PREFIX = "VNT-";

export const SaleLineSchema = z.object({
  line_id: z.number().int().positive(),
  position: z.number().int().positive(),
  product_id: z.number().int().positive(),
  product_name: z.string(),
  quantity: z.number().int().gt(0),
  unit_price: z.number().nonnegative(),
  subtotal: z.number().nonnegative(),
});

export const SaleSchema = z.object({
  sale_id: z.number().int().positive(),
  code: z.string().startsWith(SALE_CODE_PREFIX),
  customer_id: z.number().int().positive(),
  customer_name: z.string(),
  total: z.number().nonnegative(),
  created_at: z.string().datetime(),
  lines: z.array(SaleLineSchema),
});

export const SaleSummarySchema = SaleSchema.omit({ lines: true }).extend({
  line_count: z.number().int().nonnegative(),
});

// Line quantities stay loosely typed here; the ledger owns the positivity rule.
export const SaleLineInputSchema = z.object({
  product_id: z.number().int().positive(),
  quantity: z.number(),
});

export const RecordSaleInputSchema = z.object({
  customer_id: z.number().int().positive(),
  lines: z.array(SaleLineInputSchema).max(100),
});

const IsoDaySchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "must be a YYYY-MM-DD date");

export const SaleListQuerySchema = z.object({
  page: z.coerce.number().int().positive().default(1),
  page_size: z.coerce.number().int().positive().max(100).optional(),
  from: IsoDaySchema.optional(),
  to: IsoDaySchema.optional(),
});

export const DEFAULT_STATISTICS_DAYS = 30;

export const SaleStatisticsQuerySchema = z
  .object({
    days: z.coerce.number().int().positive().max(3650).optional(),
    from: IsoDaySchema.optional(),
    to: IsoDaySchema.optional(),
  })
  .refine((query) => query.days === undefined || (query.from === undefined && query.to === undefined), {
    message: "use either days or a from/to range",
    path: ["days"],
  })
  .refine((query) => !query.from || !query.to || query.from <= query.to, {
    message: "must not be after to",
    path: ["from"],
  });

export type SaleLine = z.infer<typeof SaleLineSchema>;
export type Sale = z.infer<typeof SaleSchema>;
export type SaleSummary = z.infer<typeof SaleSummarySchema>;
export type SaleLineInput = z.infer<typeof SaleLineInputSchema>;
export type RecordSaleInput = z.infer<typeof RecordSaleInputSchema>;
export type SaleListQuery = z.infer<typeof SaleListQuerySchema>;
export type SaleStatisticsQuery = z.infer<typeof SaleStatisticsQuerySchema>;

export function formatSaleCode(saleId: number): string {
  return `${SALE_CODE_PREFIX}${String(saleId).padStart(6, "0")}`;
}
