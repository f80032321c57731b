export { diff, HashMismatchError, UnknownComponentError } from "./diff.js";
export type { DiffContext, Drift, DriftKind } from "./diff.js";
