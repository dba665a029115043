import OpenAI from 'openai';
import { zodFunction } from 'openai/helpers/zod';
import {
    type ChatMessage,
    type LLMCompleteOptions,
    type LLMProvider,
    type LLMResponse,
    type Tool,
    type ToolCall
} from '@concierge/core';

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

type OpenAIToolCall = NonNullable<
    OpenAI.Chat.Completions.ChatCompletion['choices'][number]['message']['tool_calls']
>[number];

function toOpenAIMessages(systemPrompt: string, messages: ChatMessage[]): OpenAIMessage[] {
    const mapped: OpenAIMessage[] = [{ role: 'system', content: systemPrompt }];

    for (const message of messages) {
        if (message.role === 'tool') {
            mapped.push({
                role: 'tool',
                content: message.content,
                tool_call_id: message.toolCallId ?? 'tool'
            });
            continue;
        }

        if (message.role === 'assistant' && message.toolCalls && message.toolCalls.length > 0) {
            mapped.push({
                role: 'assistant',
                content: message.content || null,
                tool_calls: message.toolCalls.map((call) => ({
                    id: call.id,
                    type: 'function' as const,
                    function: { name: call.name, arguments: JSON.stringify(call.arguments) }
                }))
            });
            continue;
        }

        if (message.role === 'assistant') {
            mapped.push({ role: 'assistant', content: message.content });
            continue;
        }

        if (message.role === 'system') {
            mapped.push({ role: 'system', content: message.content });
            continue;
        }

        mapped.push({ role: 'user', content: message.content });
    }

    return mapped;
}

function toOpenAITools(tools: Tool[] | undefined): OpenAI.Chat.Completions.ChatCompletionTool[] | undefined {
    if (!tools || tools.length === 0) {
        return undefined;
    }

    return tools.map((tool) =>
        zodFunction({
            name: tool.name,
            description: tool.description,
            parameters: tool.parameters
        })
    );
}

function parseToolArguments(raw: string | undefined): Record<string, unknown> {
    if (!raw) return {};
    try {
        const parsed: unknown = JSON.parse(raw);
        return (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed))
            ? Object.fromEntries(Object.entries(parsed))
            : {};
    } catch {
        // malformed arguments surface later as a tool validation error
        return {};
    }
}

function fromOpenAIToolCalls(toolCalls: OpenAIToolCall[] | undefined): ToolCall[] {
    if (!toolCalls || toolCalls.length === 0) return [];

    return toolCalls
        .filter((call) => call.type === 'function')
        .map((call) => ({
            id: call.id,
            name: call.function.name,
            arguments: parseToolArguments(call.function.arguments)
        }));
}

export class OpenAILLMProvider implements LLMProvider {
    private client: OpenAI;

    public constructor(private readonly opts: {
        baseUrl?: string | undefined;
        apiKey: string;
        model: string;
        client?: OpenAI;
    }) {
        this.client = opts.client ?? new OpenAI({
            baseURL: opts.baseUrl,
            apiKey: opts.apiKey
        });
    }

    public async complete(options: LLMCompleteOptions): Promise<LLMResponse> {
        const start = Date.now();

        const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
            model: this.opts.model,
            messages: toOpenAIMessages(options.systemPrompt, options.messages)
        };

        const tools = toOpenAITools(options.tools);
        if (tools) {
            params.tools = tools;
        }

        const response = await this.client.chat.completions.create(
            params,
            options.signal ? { signal: options.signal } : undefined
        );
        const choice = response.choices[0]?.message;

        return {
            content: choice?.content ?? null,
            toolCalls: fromOpenAIToolCalls(choice?.tool_calls),
            tokensUsed: {
                promptTokens: response.usage?.prompt_tokens ?? 0,
                completionTokens: response.usage?.completion_tokens ?? 0
            },
            model: response.model,
            latencyMs: Date.now() - start
        };
    }
}
