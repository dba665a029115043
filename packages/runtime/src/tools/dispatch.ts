import {
  withTimeout,
  type Tool,
  type ToolCall,
  type ToolContext,
  type ToolLifecycleResult
} from '@concierge/core';

interface DispatchToolCallInput {
  toolCall: ToolCall;
  tools: Tool[];
  context: ToolContext;
  timeoutMs?: number;
}

function formatToolFailure(toolName: string, error: unknown): string {
  const reason = error instanceof Error ? error.message : String(error);
  return `Tool ${toolName} failed: ${reason}`;
}

/**
 * Runs one model-requested tool call. Every failure is folded into a
 * `recoverable_error` so the model can read it and decide what to do next.
 */
export async function dispatchToolCall(input: DispatchToolCallInput): Promise<ToolLifecycleResult> {
  const tool = input.tools.find((candidate) => candidate.name === input.toolCall.name);
  if (!tool) {
    return {
      status: 'recoverable_error',
      formatted: `Tool ${input.toolCall.name} failed: tool not found`
    };
  }

  const parsed = tool.parameters.safeParse(input.toolCall.arguments);
  if (!parsed.success) {
    return {
      status: 'recoverable_error',
      formatted: `Invalid tool params for ${input.toolCall.name}: ${parsed.error.message}`
    };
  }

  try {
    const { timeoutMs, context } = input;
    const result = timeoutMs !== undefined
      ? await withTimeout({
        timeoutMs,
        label: `Tool ${tool.name}`,
        signal: context.signal,
        run: (signal) => tool.handler(parsed.data, { ...context, signal })
      })
      : await tool.handler(parsed.data, context);
    return { status: 'ok', result };
  } catch (error) {
    return {
      status: 'recoverable_error',
      formatted: formatToolFailure(tool.name, error)
    };
  }
}
