/**
 * Cooperative cancellation helpers
 */

import { CancellationToken, LSPErrorCodes, ResponseError } from 'vscode-languageserver/node';

export function createCancelledError(): ResponseError<void> {
  return new ResponseError(LSPErrorCodes.RequestCancelled, 'Formatting request cancelled');
}

/**
 * Throw when cancellation was requested. Called at every boundary where the
 * evaluation awaits a collaborator.
 */
export function throwIfCancelled(token: CancellationToken): void {
  if (token.isCancellationRequested) {
    throw createCancelledError();
  }
}

export function isCancellationError(error: unknown): error is ResponseError<void> {
  return error instanceof ResponseError && error.code === LSPErrorCodes.RequestCancelled;
}

export { CancellationToken };
