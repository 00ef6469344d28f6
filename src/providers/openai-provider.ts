import OpenAI, {APIError, type ClientOptions} from 'openai'
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool
} from 'openai/resources/chat/completions'
import {ConnectionError} from '../core/errors.js'
import {isJsonValue, type JsonValue} from '../core/json.js'
import type {Message} from '../core/message.js'
import type {ToolCall} from '../core/tool.js'
import type {LLMProvider, ProviderReply, ProviderRequest, ProviderToolCall, ResponseFormat} from './types.js'

type OpenAIProviderOptions = {
  apiKey: string
  /** Vendor label reported in events, e.g. `openrouter` for an OpenAI-compatible endpoint. */
  name?: string
  baseUrl?: string
  timeoutMs?: number
  fetch?: ClientOptions['fetch']
}

function encodeToolCalls(calls: readonly ToolCall[]) {
  return calls.map((call) => ({
    id: call.id,
    type: 'function' as const,
    function: {name: call.name, arguments: call.rawArguments ?? JSON.stringify(call.arguments)}
  }))
}

function mapMessage(message: Message): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return {role: 'system', content: message.content}
    case 'user':
      return {role: 'user', content: message.content}
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content,
        ...(message.toolCalls?.length ? {tool_calls: encodeToolCalls(message.toolCalls)} : {})
      }
    case 'tool':
      return {role: 'tool', content: message.content, tool_call_id: message.toolCallId}
  }
}

function mapResponseFormat(format: ResponseFormat): ChatCompletionCreateParamsNonStreaming['response_format'] {
  if (format.type === 'json') return {type: 'json_object'}
  return {type: 'json_schema', json_schema: {name: format.name ?? 'response', schema: format.schema}}
}

type ParsedArguments = {arguments: JsonValue; rawArguments?: string}

// Unparseable text is kept both as the arguments value and as the replay text.
function parseArguments(raw: string): ParsedArguments {
  if (!raw.trim()) return {arguments: {}}
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return {arguments: raw, rawArguments: raw}
  }
  return isJsonValue(parsed) ? {arguments: parsed} : {arguments: raw, rawArguments: raw}
}

function parseToolCalls(completion: ChatCompletion): ProviderToolCall[] {
  const rawCalls = completion.choices[0]?.message.tool_calls ?? []
  const parsed: ProviderToolCall[] = []
  for (const call of rawCalls) {
    if (call.type !== 'function') continue
    parsed.push({id: call.id, name: call.function.name, ...parseArguments(call.function.arguments)})
  }
  return parsed
}

export class OpenAIProvider implements LLMProvider {
  readonly name: string
  private readonly client: OpenAI

  constructor(options: OpenAIProviderOptions) {
    this.name = options.name ?? 'openai'
    const rawBaseUrl = options.baseUrl ?? 'https://api.openai.com/v1'
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: rawBaseUrl.replace(/\/+$/, ''),
      timeout: options.timeoutMs,
      // Retry policy belongs to the caller.
      maxRetries: 0,
      ...(options.fetch ? {fetch: options.fetch} : {})
    })
  }

  async completeChat(request: ProviderRequest): Promise<ProviderReply> {
    const {config} = request
    const mappedTools: ChatCompletionTool[] = (request.tools ?? []).map((tool) => ({
      type: 'function' as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters
      }
    }))

    const params: ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: request.messages.map((message) => mapMessage(message)),
      ...(config.temperature !== undefined ? {temperature: config.temperature} : {}),
      ...(config.maxTokens !== undefined ? {max_tokens: config.maxTokens} : {}),
      ...(config.topP !== undefined ? {top_p: config.topP} : {}),
      ...(config.frequencyPenalty !== undefined ? {frequency_penalty: config.frequencyPenalty} : {}),
      ...(config.presencePenalty !== undefined ? {presence_penalty: config.presencePenalty} : {}),
      ...(mappedTools.length > 0 ? {tools: mappedTools, tool_choice: 'auto' as const} : {}),
      ...(request.responseFormat ? {response_format: mapResponseFormat(request.responseFormat)} : {})
    }

    let completion: ChatCompletion
    try {
      completion = await this.client.chat.completions.create(params, {signal: request.signal})
    } catch (error) {
      if (error instanceof APIError) {
        throw new ConnectionError(error.message, error.status ?? undefined, error)
      }
      throw error
    }

    const choice = completion.choices[0]
    const toolCalls = parseToolCalls(completion)
    return {
      content: choice?.message.content ?? '',
      finishReason: choice?.finish_reason ?? 'stop',
      ...(completion.usage
        ? {
            usage: {
              promptTokens: completion.usage.prompt_tokens,
              outputTokens: completion.usage.completion_tokens,
              totalTokens: completion.usage.total_tokens
            }
          }
        : {}),
      ...(toolCalls.length > 0 ? {toolCalls} : {}),
      responseId: completion.id,
      model: completion.model
    }
  }
}
