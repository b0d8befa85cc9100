export class PipelineError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = 'PipelineError';
    this.exitCode = exitCode;
  }
}

/** A required root, split directory or source file is absent. */
export class InputMissingError extends PipelineError {
  readonly path: string;

  constructor(message: string, filePath: string) {
    super(`${message}: ${filePath}`, 2);
    this.name = 'InputMissingError';
    this.path = filePath;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
