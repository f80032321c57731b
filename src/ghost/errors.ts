export class OverlayTooLargeError extends Error {
  constructor(
    public readonly count: number,
    public readonly maxFiles: number,
  ) {
    super(
      `Overlay would map more than ${maxFiles} files (at least ${count}). ` +
        `Narrow include/exclude or raise max_files in the profile.`,
    );
    this.name = "OverlayTooLargeError";
  }
}

export class GhostError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GhostError";
  }
}
