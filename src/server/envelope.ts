import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

import type { JsonValue } from '../utils/types.js';
import { DispatchError, errorMessage } from './errors.js';

export type RequestId = JsonValue;

export interface SuccessEnvelope {
  jsonrpc: '2.0';
  id: RequestId;
  result: Record<string, unknown>;
}

export interface FailureEnvelope {
  jsonrpc: '2.0';
  id: RequestId;
  error: {
    code: ErrorCode;
    message: string;
  };
}

export type ResponseEnvelope = SuccessEnvelope | FailureEnvelope;

export function success(id: RequestId, result: Record<string, unknown>): SuccessEnvelope {
  return { jsonrpc: '2.0', id, result };
}

export function failure(id: RequestId, code: ErrorCode, message: string): FailureEnvelope {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

/**
 * Converts anything thrown while handling a request into a failure envelope.
 * Errors without a protocol code are reported as internal errors.
 */
export function failureFromError(id: RequestId, error: unknown): FailureEnvelope {
  if (error instanceof DispatchError) {
    return failure(id, error.code, error.message);
  }
  return failure(id, ErrorCode.InternalError, `Internal error: ${errorMessage(error)}`);
}

export function isFailure(envelope: ResponseEnvelope): envelope is FailureEnvelope {
  return 'error' in envelope;
}
