export interface Constraint {
  range: string;
  /** Id of the dependent that imposed the range, or null for a direct request */
  requestedBy: string | null;
}

export class CyclicDependencyError extends Error {
  constructor(public readonly cycle: string[]) {
    super(`Dependency cycle: ${cycle.join(" -> ")}`);
    this.name = "CyclicDependencyError";
  }
}

export class UnsatisfiableVersionError extends Error {
  constructor(
    public readonly component: string,
    public readonly constraints: Constraint[],
  ) {
    const chain = constraints
      .map((c) => `  - ${c.range} (${c.requestedBy === null ? "requested" : `required by ${c.requestedBy}`})`)
      .join("\n");
    super(`No version of "${component}" satisfies every constraint:\n${chain}`);
    this.name = "UnsatisfiableVersionError";
  }
}

export class InvalidIdentifierError extends Error {
  constructor(
    public readonly identifier: string,
    message: string,
  ) {
    super(message);
    this.name = "InvalidIdentifierError";
  }
}
