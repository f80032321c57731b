export class ProfileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProfileError";
  }
}

export class CannotRemoveActiveProfileError extends Error {
  constructor(public readonly profile: string) {
    super(`Profile "${profile}" is the current profile. Switch to another profile before removing it.`);
    this.name = "CannotRemoveActiveProfileError";
  }
}
