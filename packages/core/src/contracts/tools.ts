import { type z } from 'zod';
import { type IdentityToken } from '../entities/identity';

export interface ToolContext {
  identity: IdentityToken | null;
  signal?: AbortSignal | undefined;
}

export interface Tool<TParameters extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: TParameters;
  handler: (params: z.infer<TParameters>, context: ToolContext) => Promise<string>;
}

export type ToolLifecycleResult =
  | { status: 'ok'; result: string }
  | { status: 'recoverable_error'; formatted: string };

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export function defineTool<TParameters extends z.ZodTypeAny>(tool: Tool<TParameters>): Tool<TParameters> {
  return tool;
}
