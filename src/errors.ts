/**
 * slotlist - Errors
 * One error class, discriminated by code
 */

import { LOG_PREFIX } from "./constants";

export type DisplayListErrorCode =
  | "INVALID_ARGUMENT"
  | "INDEX_OUT_OF_RANGE"
  | "INVALID_STATE"
  | "UNRECOGNIZED_VARIANT"
  | "BIND_FAILURE";

export interface DisplayListErrorOptions {
  cause?: unknown;
  /** Index of the slot or record involved, when there is one */
  index?: number;
}

export class DisplayListError extends Error {
  readonly code: DisplayListErrorCode;
  readonly index: number | undefined;

  constructor(
    code: DisplayListErrorCode,
    message: string,
    options: DisplayListErrorOptions = {},
  ) {
    super(`${LOG_PREFIX} ${message}`, { cause: options.cause });
    this.name = "DisplayListError";
    this.code = code;
    this.index = options.index;
  }
}

export const isDisplayListError = (
  value: unknown,
  code?: DisplayListErrorCode,
): value is DisplayListError =>
  value instanceof DisplayListError && (code === undefined || value.code === code);

// =============================================================================
// Factories
// =============================================================================

export const invalidArgument = (message: string): DisplayListError =>
  new DisplayListError("INVALID_ARGUMENT", message);

export const indexOutOfRange = (
  index: number,
  lower: number,
  upper: number,
): DisplayListError =>
  new DisplayListError(
    "INDEX_OUT_OF_RANGE",
    `Index ${index} is outside [${lower}, ${upper}]`,
    { index },
  );

export const invalidState = (message: string, index?: number): DisplayListError =>
  new DisplayListError("INVALID_STATE", message, { index });

export const unrecognizedVariant = (
  message: string,
  index?: number,
): DisplayListError => new DisplayListError("UNRECOGNIZED_VARIANT", message, { index });

export const bindFailure = (index: number, cause: unknown): DisplayListError => {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new DisplayListError(
    "BIND_FAILURE",
    `Failed to bind record ${index}: ${reason}`,
    { cause, index },
  );
};
