/**
 * Greeter module schemas - the identity shape is the source of truth,
 * types are derived with z.infer<>.
 */
import { z } from "zod";

/**
 * Identity the greeter is built from. Stored verbatim: no trimming, no
 * case change. Whitespace-only text is not empty and is accepted.
 */
export const GreeterInputSchema = z.object({
  identity: z.string().min(1, "Identity is required").describe("Who to greet"),
});

export type GreeterInput = z.infer<typeof GreeterInputSchema>;

/**
 * A greeter holds its identity and derives a greeting on demand.
 */
export type Greeter = Readonly<{
  identity: string;
  greet: () => string;
}>;
