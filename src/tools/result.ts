import { z } from 'zod';

export type ToolResult =
  | { status: 'success'; action: string; result: Record<string, unknown> }
  | { status: 'error'; action: string; message: string };

const toolResultSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('success'),
    action: z.string(),
    result: z.record(z.unknown()),
  }),
  z.object({
    status: z.literal('error'),
    action: z.string(),
    message: z.string(),
  }),
]);

export function success(action: string, result: Record<string, unknown>): ToolResult {
  return { status: 'success', action, result };
}

export function failure(action: string, message: string): ToolResult {
  return { status: 'error', action, message };
}

/** Flat JSON form handed back to the model as a tool message. */
export function serializeToolResult(result: ToolResult): string {
  return JSON.stringify(result);
}

export function parseToolResult(text: string): ToolResult {
  return toolResultSchema.parse(JSON.parse(text));
}
