export type ErrorSeverity = "failure" | "warning";

/**
 * Base for every condition that ends a describe run early. The top-level
 * handler prints it and maps it to an exit code.
 */
export class DescribeError extends Error {
  readonly severity: ErrorSeverity;
  readonly exitCode: number;

  constructor(
    message: string,
    options: { severity?: ErrorSeverity; exitCode?: number; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DescribeError";
    this.severity = options.severity ?? "failure";
    this.exitCode = options.exitCode ?? 1;
  }

  /** Text of the underlying error, shown after the message. */
  get detail(): string | undefined {
    if (this.cause instanceof Error) {
      return this.cause.message;
    }
    if (typeof this.cause === "string") {
      return this.cause;
    }
    return undefined;
  }
}

/** Nothing to show. Reported as a warning and exits successfully. */
export class NotFoundWarning extends DescribeError {
  constructor(message: string) {
    super(message, { severity: "warning", exitCode: 0 });
    this.name = "NotFoundWarning";
  }
}

export class FlagParseError extends DescribeError {
  constructor(cause: unknown) {
    super("cannot parse flags", { cause });
    this.name = "FlagParseError";
  }
}

export class DecodeError extends DescribeError {
  readonly endpoint: string;

  constructor(endpoint: string, cause: unknown) {
    super(`could not unmarshal response from ${endpoint}`, { cause });
    this.name = "DecodeError";
    this.endpoint = endpoint;
  }
}

/** A well-formed response that cannot be used, e.g. a space without an org. */
export class ResponseError extends DescribeError {
  constructor(message: string) {
    super(message);
    this.name = "ResponseError";
  }
}

export class HostCommandError extends DescribeError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "HostCommandError";
  }
}
