export { buildOverlayMapping, isVisible } from "./mapping.js";
export type { MappingInput, OverlayEntry, OverlayMapping, OverlayOrigin } from "./mapping.js";
export { beginGhostSession, endGhostSession, gitEnv } from "./session.js";
export type { BeginOptions, GhostSession, SessionSummary } from "./session.js";
export { runInGhostSession } from "./run.js";
export type { RunOptions, RunResult } from "./run.js";
export { OverlayTooLargeError, GhostError } from "./errors.js";
