export { openProfileStore, DEFAULT_PROFILE, PROFILE_ENV } from "./store.js";
export type { Profile, ProfileStore, CurrentProfileOptions } from "./store.js";
export { ProfileError, CannotRemoveActiveProfileError } from "./errors.js";
