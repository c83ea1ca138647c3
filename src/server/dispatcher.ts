import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { PROTOCOL_VERSION, SERVER_INFO } from '../config.js';
import { debugLog } from '../utils/logger.js';
import type { JsonValue } from '../utils/types.js';
import { failure, failureFromError, success, type RequestId, type ResponseEnvelope } from './envelope.js';
import { DispatchError } from './errors.js';
import type { ToolRegistry } from './registry.js';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/** Any JSON value is echoed back as the id. */
export const RequestIdSchema = JsonValueSchema;

// params are checked by the method that reads them
export const RequestSchema = z.object({
  method: z.string(),
  id: RequestIdSchema.optional(),
  params: z.unknown().optional(),
});

export type Request = z.infer<typeof RequestSchema>;

const CallToolParamsSchema = z.object(
  {
    name: z.string({ required_error: 'Missing tool name' }),
    arguments: z.record(z.unknown()).optional(),
  },
  { invalid_type_error: 'Expected an object' }
);

function callTool(registry: ToolRegistry, params: unknown) {
  const decoded = CallToolParamsSchema.safeParse(params);
  if (!decoded.success) {
    const detail = decoded.error.issues.map((issue) => issue.message).join('; ');
    throw new DispatchError(ErrorCode.InvalidParams, `Invalid params: ${detail}`);
  }
  const { name, arguments: args = {} } = decoded.data;

  const handler = registry.resolve(name);
  if (!handler) {
    throw new DispatchError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }

  const check = handler.validate(args);
  if (!check.valid) {
    throw new DispatchError(
      ErrorCode.InvalidParams,
      `Invalid arguments for ${name}: ${check.issues.join('; ')}`
    );
  }

  const result = check.execute();
  return {
    content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
  };
}

/**
 * Handles one decoded request. Returns undefined for a notification (a
 * `notifications/` method sent without an id), which gets no response.
 * Never throws: every failure becomes a failure envelope.
 */
export function dispatch(registry: ToolRegistry, request: Request): ResponseEnvelope | undefined {
  const id: RequestId = request.id ?? null;
  const params = request.params ?? {};

  if (request.method.startsWith('notifications/') && request.id === undefined) {
    debugLog('Notification received:', request.method);
    return undefined;
  }

  try {
    switch (request.method) {
      case 'initialize':
        return success(id, {
          protocolVersion: PROTOCOL_VERSION,
          capabilities: { tools: {}, resources: {}, prompts: {} },
          serverInfo: { ...SERVER_INFO },
        });
      case 'tools/list':
        debugLog('List tools request received');
        return success(id, { tools: registry.list() });
      case 'tools/call':
        debugLog('Call tool request received:', JSON.stringify(params));
        return success(id, callTool(registry, params));
      case 'resources/list':
        return success(id, { resources: [] });
      case 'prompts/list':
        return success(id, { prompts: [] });
      default:
        return failure(id, ErrorCode.MethodNotFound, `Unknown method: ${request.method}`);
    }
  } catch (error) {
    debugLog('Request failed:', request.method, error);
    return failureFromError(id, error);
  }
}
