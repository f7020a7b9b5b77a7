/** Fatal conditions detected before any step runs. */
export class PreconditionFailure extends Error {
  constructor(
    message: string,
    readonly exitCode: number
  ) {
    super(message);
    this.name = "PreconditionFailure";
  }
}

export class InsufficientPrivilegeError extends PreconditionFailure {
  constructor() {
    super("Administrator privileges are required to collect diagnostics", 2);
    this.name = "InsufficientPrivilegeError";
  }
}

export class OutputRootError extends PreconditionFailure {
  constructor(
    readonly outputPath: string,
    cause: string
  ) {
    super(`Output directory ${outputPath} is not usable: ${cause}`, 1);
    this.name = "OutputRootError";
  }
}
