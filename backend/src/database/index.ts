export { createDatabase, initializeDatabase, type DatabaseOptions } from "./schema.js";
export { withTransaction } from "./transaction.js";
