export class InstallError extends Error {
  constructor(
    public readonly component: string,
    message: string,
  ) {
    super(message);
    this.name = "InstallError";
  }
}
