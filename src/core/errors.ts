/**
 * Custom Error Classes for Plugin Relay
 */

/**
 * Error thrown when a plugin declares an intercept for a command whose
 * instruction file does not exist. The only resolution failure that signals
 * a misconfigured plugin rather than an ordinary miss.
 */
export class InstructionFileMissingError extends Error {
  public readonly commandMdPath: string;

  constructor(commandMdPath: string) {
    super(`Command file not found: ${commandMdPath}`);
    this.name = 'InstructionFileMissingError';
    this.commandMdPath = commandMdPath;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InstructionFileMissingError);
    }
  }
}

/**
 * Error thrown when delegated tool arguments do not form a valid invocation
 */
export class InvalidInvocationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid plugin invocation: ${issues.join('; ')}`);
    this.name = 'InvalidInvocationError';
    this.issues = issues;
  }
}

/**
 * Error a TextGenerator throws when the provider rejects its credentials
 */
export class GenerationAuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GenerationAuthError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
