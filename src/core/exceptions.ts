/**
 * Custom errors raised by expctl commands.
 */

export class ExpctlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExpctlError";
  }
}

/** Malformed command line: dangling flag, wrong argument count, bad date. */
export class ArgumentSyntaxError extends ExpctlError {
  constructor(message: string) {
    super(message);
    this.name = "ArgumentSyntaxError";
  }
}

export class UnknownCommandError extends ExpctlError {
  command: string;

  constructor(command: string) {
    super(`Unknown command: ${command}`);
    this.name = "UnknownCommandError";
    this.command = command;
  }
}

export class NotImplementedError extends ExpctlError {
  constructor(feature: string, reason?: string) {
    super(
      reason
        ? `${feature} is not implemented: ${reason}`
        : `${feature} is not implemented`,
    );
    this.name = "NotImplementedError";
  }
}

export class ExperimentConfigError extends ExpctlError {
  path: string;

  constructor(path: string, message: string) {
    super(`Invalid experiment file ${path}: ${message}`);
    this.name = "ExperimentConfigError";
    this.path = path;
  }
}

export class DuplicateExperimentError extends ExpctlError {
  userDefinedId: string;

  constructor(userDefinedId: string) {
    super(`Experiment '${userDefinedId}' already exists`);
    this.name = "DuplicateExperimentError";
    this.userDefinedId = userDefinedId;
  }
}

export class ExperimentNotFoundError extends ExpctlError {
  userDefinedId: string;

  constructor(userDefinedId: string) {
    super(`Experiment '${userDefinedId}' not found`);
    this.name = "ExperimentNotFoundError";
    this.userDefinedId = userDefinedId;
  }
}

export class ConfigurationError extends ExpctlError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = "ConfigurationError";
  }
}
