/**
 * Engine errors.
 *
 * - PreconditionError: a caller broke the board's contract (illegal move,
 *   retract on an empty history, bad square). Never caught inside the engine.
 * - ConfigurationError: a setting was rejected; the board is left as it was.
 */

export type PreconditionCode =
  | "PRECONDITION_ILLEGAL_MOVE"
  | "PRECONDITION_EMPTY_HISTORY"
  | "PRECONDITION_UNBALANCED_HISTORY"
  | "PRECONDITION_BAD_SQUARE"
  | "PRECONDITION_BAD_PIECE"
  | "PRECONDITION_NO_MOVES";

export type ConfigurationCode = "CONFIG_MOVE_LIMIT" | "CONFIG_BAD_LAYOUT" | "CONFIG_SEARCH_DEPTH";

export type EngineErrorCode = PreconditionCode | ConfigurationCode;

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: EngineErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PreconditionError extends EngineError {
  constructor(code: PreconditionCode, message: string, context: Record<string, unknown> = {}) {
    super(code, message, context);
    this.name = "PreconditionError";
  }
}

export class ConfigurationError extends EngineError {
  constructor(code: ConfigurationCode, message: string, context: Record<string, unknown> = {}) {
    super(code, message, context);
    this.name = "ConfigurationError";
  }
}
