/** Raised by the input layer when text or table cells cannot be turned into ranking inputs. */
export class InputParseError extends Error {
  readonly code = "INPUT_PARSE";
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "InputParseError";
    this.details = details;
  }
}
