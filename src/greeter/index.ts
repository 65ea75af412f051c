/**
 * Greeter module public API.
 * Modules import from other modules via index.ts only - no deep imports.
 */
export { createGreeter } from "./service.js";
export { formatGreeting } from "./transform.js";
export type { GreeterError, InvalidIdentityError } from "./errors.js";
export type { Greeter, GreeterInput } from "./schema.js";
export { GreeterInputSchema } from "./schema.js";
