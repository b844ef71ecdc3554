// pattern: Functional Core

/**
 * Base class for collector errors that abort the whole run.
 * Anything that only degrades a report section is rendered into the report instead.
 */
export abstract class CollectDataError extends Error {
  public readonly category: string;

  protected constructor(category: string, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;

    // Maintain proper stack trace for where our error was thrown
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The collector was started without root privileges
 */
export class PrivilegeError extends CollectDataError {
  constructor(message = "Need to run as root") {
    super("privilege", message);
  }
}

/**
 * The runtime binary could not be found on PATH
 */
export class RuntimeNotFoundError extends CollectDataError {
  public readonly runtimeName: string;

  constructor(runtimeName: string) {
    super("runtime", `cannot find runtime '${runtimeName}'`);
    this.runtimeName = runtimeName;
  }
}

/**
 * The runtime refused to report its configuration search path
 */
export class RuntimeQueryError extends CollectDataError {
  public readonly runtimeVersion: string;

  constructor(message: string, runtimeVersion: string) {
    super("runtime", message);
    this.runtimeVersion = runtimeVersion;
  }
}
