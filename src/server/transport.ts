import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

import { errorLog } from '../utils/logger.js';
import { dispatch, RequestIdSchema, RequestSchema } from './dispatcher.js';
import { failure, failureFromError, type RequestId, type ResponseEnvelope } from './envelope.js';
import type { ToolRegistry } from './registry.js';

function readableId(decoded: unknown): RequestId {
  if (typeof decoded !== 'object' || decoded === null || !('id' in decoded)) {
    return null;
  }
  const id = RequestIdSchema.safeParse(decoded.id);
  return id.success ? id.data : null;
}

function decodeLine(registry: ToolRegistry, line: string): ResponseEnvelope | undefined {
  let decoded: unknown;
  try {
    decoded = JSON.parse(line);
  } catch {
    return failure(null, ErrorCode.ParseError, 'Parse error');
  }

  const request = RequestSchema.safeParse(decoded);
  if (!request.success) {
    return failure(readableId(decoded), ErrorCode.InvalidRequest, 'Invalid request');
  }
  return dispatch(registry, request.data);
}

/**
 * Turns one input line into at most one output line (without the newline).
 * Blank lines and notifications sent without an id produce nothing.
 */
export function handleLine(registry: ToolRegistry, line: string): string | undefined {
  if (line.trim() === '') {
    return undefined;
  }
  let envelope: ResponseEnvelope | undefined;
  try {
    envelope = decodeLine(registry, line);
  } catch (error) {
    errorLog('Unhandled failure while handling line:', error);
    envelope = failureFromError(null, error);
  }
  return envelope === undefined ? undefined : JSON.stringify(envelope);
}

// Settles on drain, or when the stream fails or closes; the failure itself
// is reported by the loop's error listener.
function writable(output: Writable): Promise<void> {
  return new Promise((resolve) => {
    const settle = () => {
      output.off('drain', settle);
      output.off('error', settle);
      output.off('close', settle);
      resolve();
    };
    output.on('drain', settle);
    output.on('error', settle);
    output.on('close', settle);
  });
}

/**
 * Reads requests line by line until the input ends or the output fails
 * (the client closed the pipe). Each response is written, waiting for
 * drain when the output is full, before the next line is handled.
 */
export async function runStdioLoop(
  registry: ToolRegistry,
  input: Readable = process.stdin,
  output: Writable = process.stdout
): Promise<void> {
  const lines = readline.createInterface({ input, crlfDelay: Infinity });
  let outputFailed = false;
  const onOutputError = (error: Error) => {
    outputFailed = true;
    errorLog('Output stream failed, stopping:', error.message);
    lines.close();
  };
  // Stays attached after the loop: a write can still fail once it has returned.
  output.on('error', onOutputError);

  try {
    for await (const line of lines) {
      if (outputFailed || output.destroyed) {
        break;
      }
      const response = handleLine(registry, line);
      if (response !== undefined && !output.write(`${response}\n`) && !output.destroyed) {
        await writable(output);
      }
    }
  } finally {
    lines.close();
  }
}
