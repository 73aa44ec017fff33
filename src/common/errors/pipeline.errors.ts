export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidPipelineOptionsError extends PipelineError {
  constructor(readonly violations: string[]) {
    super(`Invalid pipeline options: ${violations.join('; ')}`);
  }
}

export class InputFormatError extends PipelineError {
  constructor(
    readonly filePath: string,
    readonly lineNumber: number,
    detail: string,
  ) {
    super(`${filePath}:${lineNumber}: ${detail}`);
  }
}
