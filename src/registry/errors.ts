export class RegistryUnavailableError extends Error {
  constructor(
    public readonly registry: string,
    message: string,
  ) {
    super(`Registry "${registry}": ${message}`);
    this.name = "RegistryUnavailableError";
  }
}

export class FileNotFoundError extends Error {
  constructor(
    public readonly registry: string,
    public readonly component: string,
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = "FileNotFoundError";
  }
}
