// src/tools/shared.ts
// Argument schemas and helpers shared by the tool modules

import { z } from 'zod';

import type { JsonObject, JsonValue } from '../connection/types.js';

export const Vector3 = z.tuple([z.number(), z.number(), z.number()]);
export type Vector3 = z.infer<typeof Vector3>;

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

/** RGB or RGBA, each channel nominally 0..1 */
export const ColorArg = z.union([z.tuple([z.number(), z.number(), z.number()]), z.tuple([z.number(), z.number(), z.number(), z.number()])]);
export type ColorArg = z.infer<typeof ColorArg>;

export const DEFAULT_CUBE_MESH = '/Engine/BasicShapes/Cube.Cube';

export class ToolArgumentError extends Error {
  constructor(
    readonly tool: string,
    readonly issues: string[]
  ) {
    super(`Invalid arguments for ${tool}: ${issues.join('; ')}`);
    this.name = 'ToolArgumentError';
  }
}

/**
 * Validate raw MCP arguments against a tool's schema.
 */
export function parseArgs<S extends z.ZodTypeAny>(tool: string, schema: S, args: unknown): z.output<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const where = issue.path.length > 0 ? issue.path.join('.') : 'arguments';
      return `${where}: ${issue.message}`;
    });
    throw new ToolArgumentError(tool, issues);
  }
  return parsed.data;
}
