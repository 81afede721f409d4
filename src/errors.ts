export class ExtractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtractError";
  }
}

/** An input source could not be read. The only condition that aborts a run. */
export class InputReadError extends ExtractError {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = "InputReadError";
  }
}

export class RegistryError extends ExtractError {
  constructor(message: string, public readonly registryPath: string) {
    super(message);
    this.name = "RegistryError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
