/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)` — Runtime assertion for programmer errors
 * - `unreachable(value)` — Mark impossible code paths
 *
 * @example
 * ```typescript
 * type Annotation = { kind: "raw" } | { kind: "context" };
 * function describe(a: Annotation): string {
 *   switch (a.kind) {
 *     case "raw": return "raw";
 *     case "context": return "context";
 *     default: return unreachable(a); // Type error if Annotation is extended
 *   }
 * }
 * ```
 */

/**
 * Runtime invariant check.
 *
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param value - A value of type `never` (for type-level exhaustiveness)
 * @throws Error always
 */
export function unreachable(value: never): never {
  throw new Error(`Unreachable code reached with ${JSON.stringify(value)}`);
}
