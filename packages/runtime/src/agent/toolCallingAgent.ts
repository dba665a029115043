import {
  withTimeout,
  type Agent,
  type AgentInvocation,
  type ChatMessage,
  type IdentityToken,
  type LLMProvider,
  type Logger,
  type RuntimeResource,
  type Tool
} from '@concierge/core';

import { dispatchToolCall } from '../tools/dispatch';

export interface ToolCallingAgentOptions {
  llm: LLMProvider;
  systemPrompt: string;
  tools: Tool[];
  identity: IdentityToken | null;
  /** Connection owned by this agent, released on `close`. */
  connection: RuntimeResource;
  logger: Logger;
  maxToolIterations: number;
  llmTimeoutMs: number;
  toolTimeoutMs: number;
}

/**
 * Single-turn agent: each `invoke` replays the supplied history, lets the
 * model call tools a bounded number of times and returns its final text.
 */
export class ToolCallingAgent implements Agent {
  private readonly options: ToolCallingAgentOptions;
  private readonly logger: Logger;
  private closing: Promise<void> | null = null;

  public constructor(options: ToolCallingAgentOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: 'agent' });
  }

  public async invoke(request: AgentInvocation): Promise<string> {
    if (this.closing) {
      throw new Error('Agent is closed');
    }

    const { llm, systemPrompt, tools, maxToolIterations } = this.options;
    const history = request.history ?? [];
    let messages: ChatMessage[] = [
      ...history.map((turn): ChatMessage => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: request.input }
    ];

    for (let iteration = 0; iteration <= maxToolIterations; iteration++) {
      const response = await withTimeout({
        timeoutMs: this.options.llmTimeoutMs,
        label: 'LLM completion',
        signal: request.signal,
        run: (signal) => llm.complete({ messages, systemPrompt, tools, signal })
      });

      this.logger.debug({
        iteration,
        model: response.model,
        latencyMs: response.latencyMs,
        toolCalls: response.toolCalls.length
      }, 'LLM completion received');

      if (response.toolCalls.length === 0) {
        if (!response.content?.trim()) {
          throw new Error('Model returned an empty reply');
        }
        return response.content;
      }

      if (iteration === maxToolIterations) {
        throw new Error(`Tool iteration limit of ${maxToolIterations} reached`);
      }

      messages = [
        ...messages,
        { role: 'assistant', content: response.content ?? '', toolCalls: response.toolCalls }
      ];

      for (const toolCall of response.toolCalls) {
        const dispatched = await dispatchToolCall({
          toolCall,
          tools,
          context: { identity: this.options.identity, signal: request.signal },
          timeoutMs: this.options.toolTimeoutMs
        });
        if (dispatched.status === 'recoverable_error') {
          this.logger.warn({ tool: toolCall.name, error: dispatched.formatted }, 'Tool call failed');
        }
        messages = [
          ...messages,
          {
            role: 'tool',
            toolCallId: toolCall.id,
            content: dispatched.status === 'ok' ? dispatched.result : dispatched.formatted
          }
        ];
      }
    }

    throw new Error('Tool loop exited unexpectedly');
  }

  public close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.options.connection.close?.() ?? Promise.resolve();
    }
    return this.closing;
  }
}
