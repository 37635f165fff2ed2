import { ErrorCodes, ResponseError } from 'vscode-languageserver/node.js';
import {
  CapabilityDisabledError,
  ConfigError,
  ContactsDirectoryError,
  UnknownDocumentError,
  errorMessage,
  logger,
} from '../utils/index.js';

/** Map a thrown error onto the response error the client receives. */
export function toResponseError(err: unknown): ResponseError<void> {
  if (err instanceof ResponseError) return err;
  if (err instanceof CapabilityDisabledError) {
    return new ResponseError(ErrorCodes.MethodNotFound, err.message);
  }
  if (err instanceof UnknownDocumentError || err instanceof ConfigError) {
    return new ResponseError(ErrorCodes.InvalidParams, err.message);
  }
  if (err instanceof ContactsDirectoryError) {
    return new ResponseError(ErrorCodes.InvalidRequest, err.message);
  }
  logger.error('Request failed:', err);
  return new ResponseError(ErrorCodes.InternalError, errorMessage(err));
}

/** Run a request handler, turning any error into a response error. */
export function guard<T>(handler: () => T): T | ResponseError<void> {
  try {
    return handler();
  } catch (err) {
    return toResponseError(err);
  }
}

export async function guardAsync<T>(handler: () => Promise<T>): Promise<T | ResponseError<void>> {
  try {
    return await handler();
  } catch (err) {
    return toResponseError(err);
  }
}
