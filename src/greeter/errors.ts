/**
 * Greeter module error types - typed error unions, not strings.
 */
import type { ZodIssue } from "zod";

export type InvalidIdentityError = {
  readonly type: "INVALID_IDENTITY";
  readonly identity: string;
  readonly issues: ReadonlyArray<ZodIssue>;
};

export type GreeterError = InvalidIdentityError;

/**
 * Helper to create invalid identity error.
 */
export const invalidIdentityError = (
  identity: string,
  issues: ReadonlyArray<ZodIssue>,
): GreeterError => ({
  type: "INVALID_IDENTITY",
  identity,
  issues,
});
