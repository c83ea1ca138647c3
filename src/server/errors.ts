import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

/**
 * A failure that maps onto a JSON-RPC error code in the response envelope.
 */
export class DispatchError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'DispatchError';
    this.code = code;
  }
}

/** Thrown at startup when two tools claim the same name. */
export class RegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistrationError';
  }
}

/** A fault raised by the relational store while running a query. */
export class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
