/**
 * Greeter service - validates the identity and hands back a greeter.
 */
import { type Result, err, ok } from "neverthrow";
import { createLogger } from "../logger.js";
import { type GreeterError, invalidIdentityError } from "./errors.js";
import { type Greeter, GreeterInputSchema } from "./schema.js";
import { formatGreeting } from "./transform.js";

const log = createLogger("greeter");

/**
 * Construct a greeter for `identity`.
 * Fails with INVALID_IDENTITY when the identity is empty.
 */
export const createGreeter = (
  identity: string,
): Result<Greeter, GreeterError> => {
  const parsed = GreeterInputSchema.safeParse({ identity });
  if (!parsed.success) {
    log.warn(
      { operation: "createGreeter", issues: parsed.error.issues },
      "  ↳ Identity rejected",
    );
    return err(invalidIdentityError(identity, parsed.error.issues));
  }

  const stored = parsed.data.identity;
  log.debug(
    { operation: "createGreeter", identity: stored },
    "  ↳ Greeter ready",
  );

  return ok(
    Object.freeze({
      identity: stored,
      greet: () => formatGreeting(stored),
    }),
  );
};
