export { materializeLinks, collectLinkChanges, SymlinkError } from "./manager.js";
export type { LinkTarget, LinkChanges } from "./manager.js";
