/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import {
  ConnectionError,
  DanglingReferenceError,
  DocumentNotFoundError,
} from "@microdm/odm";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NOT_FOUND = 2;
export const EXIT_CONNECTION = 3;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;
  /** Commander has already printed the message */
  reported: boolean;

  constructor(
    message: string,
    options?: { exitCode?: number; cause?: unknown; reported?: boolean }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_FAILURE;
    this.reported = options?.reported ?? false;
  }
}

/**
 * Map ODM errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/unknown error
 * - 2: document not found or dangling reference
 * - 3: cannot connect to the store
 */
export function mapOdmErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof DocumentNotFoundError || error instanceof DanglingReferenceError) {
    return EXIT_NOT_FOUND;
  }

  if (error instanceof ConnectionError) {
    return EXIT_CONNECTION;
  }

  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  return EXIT_FAILURE;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause instanceof Error) {
      message += `\n  Cause: ${error.cause.message}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
