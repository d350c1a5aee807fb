export interface ConfigurationIssue {
  path: string;
  message: string;
}

export class ConfigurationError extends Error {
  readonly issues: ConfigurationIssue[];

  constructor(message = "Invalid job configuration", issues: ConfigurationIssue[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class ResolutionError extends Error {
  constructor(message = "Malformed capability identifier") {
    super(message);
    this.name = "ResolutionError";
  }
}

export class NotFoundError extends Error {
  constructor(message = "Capability not found", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

export class CodecError extends Error {
  constructor(message = "Malformed serialized payload", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CodecError";
  }
}
