/**
 * Internal brand symbols used to tag created objects at runtime and help with
 * type-narrowing.
 * @internal
 */
export const symbolError: unique symbol = Symbol.for("graphdump.error");
