export { resolve } from "./resolver.js";
export type { PlanEntry, ResolveOptions } from "./resolver.js";
export { parseIdentifier, componentId, formatRequest } from "./identifier.js";
export type { ComponentRequest } from "./identifier.js";
export { CyclicDependencyError, UnsatisfiableVersionError, InvalidIdentifierError } from "./errors.js";
export type { Constraint } from "./errors.js";
