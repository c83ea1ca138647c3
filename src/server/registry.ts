import { z } from 'zod';

import type { ToolResult } from '../utils/types.js';
import { RegistrationError } from './errors.js';

export const TOOL_NAMES = [
  'get_team_info',
  'get_player_info',
  'get_match_details',
  'get_ball_by_ball',
  'get_player_performance',
  'get_match_officials',
  'get_venue_info',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((toolName) => toolName === name);
}

export interface PropertySchema {
  type: 'string' | 'integer';
  description: string;
  enum?: readonly string[];
  default?: string;
  minimum?: number;
}

export interface ToolDescriptor {
  name: ToolName;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, PropertySchema>;
    required?: string[];
    additionalProperties: false;
  };
}

export type ArgumentCheck =
  | { valid: true; execute: () => ToolResult }
  | { valid: false; issues: string[] };

/**
 * A callable tool: its published descriptor, and a decode step that either
 * rejects the raw argument bag or hands back a bound execution.
 */
export interface ToolHandler {
  readonly descriptor: ToolDescriptor;
  validate(args: Record<string, unknown>): ArgumentCheck;
}

export interface ToolDefinition<S extends z.ZodTypeAny> {
  descriptor: ToolDescriptor;
  args: S;
  execute: (args: z.output<S>) => ToolResult;
}

function describeIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Pairs a descriptor with the zod schema that decodes its arguments. The
 * schema is expected to be strict, so unrecognized keys fail decoding.
 */
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): ToolHandler {
  return {
    descriptor: definition.descriptor,
    validate(args) {
      const parsed = definition.args.safeParse(args);
      if (!parsed.success) {
        return { valid: false, issues: parsed.error.issues.map(describeIssue) };
      }
      const decoded: z.output<S> = parsed.data;
      return { valid: true, execute: () => definition.execute(decoded) };
    },
  };
}

export class ToolRegistry {
  private readonly handlers = new Map<ToolName, ToolHandler>();

  register(handler: ToolHandler): void {
    const name = handler.descriptor.name;
    if (this.handlers.has(name)) {
      throw new RegistrationError(`Tool already registered: ${name}`);
    }
    this.handlers.set(name, handler);
  }

  /** Descriptors in registration order. */
  list(): ToolDescriptor[] {
    return Array.from(this.handlers.values(), (handler) => handler.descriptor);
  }

  resolve(name: string): ToolHandler | undefined {
    return isToolName(name) ? this.handlers.get(name) : undefined;
  }
}
