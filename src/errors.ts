/** Base class for everything this package throws. */
export class TextAreaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid configuration (e.g. a tab string containing non-space characters).
 * Raised at the point the value is set, never later when it is used.
 */
export class ConfigError extends TextAreaError {}

/**
 * A caller broke an operation's precondition, such as handing a line break
 * to `insertText`.
 */
export class ContractViolationError extends TextAreaError {}

/**
 * Buffer corruption detected by `TextArea.checkInvariants()`. Seeing one of
 * these means the buffer logic itself has a bug.
 */
export class InvariantViolationError extends TextAreaError {
  constructor(
    readonly invariant: string,
    readonly detail: string,
  ) {
    super(`${invariant}: ${detail}`);
  }
}
