import { z } from "zod";

export const CustomerSchema = z.object({
  customer_id: z.number().int().positive(),
  first_name: z.string().min(1),
  last_name: z.string().min(1),
  email: z.string().email().nullable(),
  phone: z.string().nullable(),
  address: z.string().nullable(),
  created_at: z.string().datetime(),
});

const EmailSchema = z.string().trim().email().max(200);
const PhoneSchema = z
  .string()
  .trim()
  .max(30)
  .regex(/^[0-9+()\s-]*$/, "must contain only digits, spaces and + ( ) -");
const AddressSchema = z.string().trim().max(300);

const CustomerNameSchema = z.string().trim().min(1).max(100);

export const CreateCustomerInputSchema = z
  .object({
    first_name: CustomerNameSchema,
    last_name: CustomerNameSchema,
    email: EmailSchema.optional(),
    phone: PhoneSchema.optional(),
    address: AddressSchema.optional(),
  })
  .strict();

// null clears a contact field
export const UpdateCustomerInputSchema = z
  .object({
    first_name: CustomerNameSchema,
    last_name: CustomerNameSchema,
    email: EmailSchema.nullable(),
    phone: PhoneSchema.nullable(),
    address: AddressSchema.nullable(),
  })
  .partial()
  .strict();

export const CustomerListQuerySchema = z.object({
  page: z.coerce.number().int().positive().default(1),
  page_size: z.coerce.number().int().positive().max(100).optional(),
});

export type Customer = z.infer<typeof CustomerSchema>;
export type CreateCustomerInput = z.infer<typeof CreateCustomerInputSchema>;
export type UpdateCustomerInput = z.infer<typeof UpdateCustomerInputSchema>;
export type CustomerListQuery = z.infer<typeof CustomerListQuerySchema>;

export function customerDisplayName(
  customer: Pick<Customer, "first_name" | "last_name">,
): string {
  return `${customer.first_name} ${customer.last_name}`;
}
