/**
 * Input errors raised at I/O boundaries
 */

import { ZodError } from "zod";
import type { InputIssueReason } from "../types";

export class InputError extends Error {
  constructor(
    readonly reason: InputIssueReason,
    readonly path: string,
    message: string,
  ) {
    super(`${path}: ${message}`);
    this.name = "InputError";
  }
}

function errorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;
}

/**
 * Wrap any failure from reading or parsing an input file
 */
export function toInputError(
  path: string,
  error: unknown,
  context: "read" | "write" = "read",
): InputError {
  if (error instanceof InputError) return error;

  if (error instanceof ZodError) {
    return new InputError(
      "schema-validation",
      path,
      error.issues
        .map((e) => (e.path.length ? `${e.path.map(String).join(".")}: ${e.message}` : e.message))
        .join("; "),
    );
  }
  if (error instanceof SyntaxError) {
    return new InputError("invalid-json", path, error.message);
  }
  if (error instanceof Error) {
    const code = errorCode(error);
    const message = code === "ENOENT" ? "file not found" : error.message;
    return new InputError(
      context === "write" ? "write-error" : "read-error",
      path,
      message,
    );
  }
  return new InputError("read-error", path, String(error));
}
