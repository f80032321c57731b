export { install, settingsPathFor, aggregateSettings } from "./installer.js";
export type { InstallContext, InstallOptions, InstallResult, InstallStatus } from "./installer.js";
export { InstallError } from "./errors.js";
export { homeDirFor, installPathFor } from "./placement.js";
export { mergeFragment, writeSettings, isRecord, SettingsError } from "./settings.js";
export type { SettingsDocument } from "./settings.js";
