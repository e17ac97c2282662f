import { z } from "zod";
import { ForbiddenError } from "../errors.js";

export const RoleSchema = z.enum(["admin", "seller", "stock"]);

export const ActorSchema = z.object({
  username: z
    .string()
    .trim()
    .min(1)
    .max(100)
    .regex(/^[a-zA-Z0-9_.@-]+$/, "must be alphanumeric"),
  roles: z.array(RoleSchema),
});

export type Role = z.infer<typeof RoleSchema>;
export type Actor = z.infer<typeof ActorSchema>;

export type Permission =
  | "sales:write"
  | "customers:write"
  | "stock:write"
  | "catalog:write";

const PERMISSION_ROLES: Record<Permission, readonly Role[]> = {
  "sales:write": ["admin", "seller"],
  "customers:write": ["admin", "seller"],
  "stock:write": ["admin", "stock"],
  "catalog:write": ["admin", "stock"],
};

export function can(actor: Actor, permission: Permission): boolean {
  const allowed = PERMISSION_ROLES[permission];
  return actor.roles.some((role) => allowed.includes(role));
}

export function authorize(actor: Actor, permission: Permission): void {
  if (!can(actor, permission)) {
    throw new ForbiddenError(actor.username, permission);
  }
}

