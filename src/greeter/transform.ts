/**
 * Greeter transformations - pure functions with no side effects.
 */

/**
 * Creates the greeting for an identity.
 *
 * @example
 * formatGreeting("world") // "Hello, world"
 */
export const formatGreeting = (identity: string): string =>
  `Hello, ${identity}`;
