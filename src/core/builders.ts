import {randomUUID} from 'node:crypto'
import type {LLMProvider, ProviderReply, ProviderRequest, ResponseFormat} from '../providers/types.js'
import {ConnectionError, StructuredOutputError, ToolCallError, TooltalkError, ValidationError, errorMessage} from './errors.js'
import type {EventBus} from './event-bus.js'
import type {ClientEvent, CompletionKind} from './events.js'
import {freezeJson, isJsonObject, isJsonValue, parseJsonText, type JsonObject} from './json.js'
import {MessageCollection, type Message} from './message.js'
import type {ModelId} from './model-id.js'
import {mergeRequestConfig, type RequestConfig} from './request-config.js'
import {Response, StructuredResponse, ToolResponse} from './response.js'
import {ToolCall, ToolDefinition} from './tool.js'
import {assertToolTurns} from './tool-turns.js'
import {Usage} from './usage.js'

export type MessageInput = MessageCollection | readonly Message[]

export type CompleteOptions = {
  /** Forwarded to the provider; aborting rejects the pending completion. */
  signal?: AbortSignal
}

/** What every builder of one session shares: the parsed model id, the provider and the event bus. */
export type SessionContext = {
  readonly modelId: ModelId
  readonly provider: LLMProvider
  readonly bus?: EventBus<ClientEvent>
}

export type StructuredFormat = 'json' | 'json_schema'

export type ToolInput = ToolDefinition | Record<string, unknown>

type ExchangeRequest = Pick<ProviderRequest, 'tools' | 'responseFormat'>

function toMessageList(input: MessageInput): readonly Message[] {
  return input instanceof MessageCollection ? input.all() : [...input]
}

function usageFromReply(reply: ProviderReply): Usage {
  if (!reply.usage) return Usage.empty()
  return new Usage(reply.usage.promptTokens, reply.usage.outputTokens, reply.usage.totalTokens)
}

function asTooltalkError(error: unknown): TooltalkError {
  if (error instanceof TooltalkError) return error
  return new ConnectionError(errorMessage(error), undefined, error)
}

/**
 * Shared request configuration and dispatch. Setters validate, mutate and return the
 * same builder so calls can be chained.
 */
export abstract class CompletionBuilder<TResponse extends Response> {
  private config: RequestConfig

  protected constructor(
    protected readonly session: SessionContext,
    config: RequestConfig = {}
  ) {
    this.config = mergeRequestConfig({}, config)
  }

  abstract complete(messages: MessageInput, options?: CompleteOptions): Promise<TResponse>

  setTemperature(temperature: number): this {
    return this.withOptions({temperature})
  }

  setMaxTokens(maxTokens: number): this {
    return this.withOptions({maxTokens})
  }

  setTopP(topP: number): this {
    return this.withOptions({topP})
  }

  setFrequencyPenalty(frequencyPenalty: number): this {
    return this.withOptions({frequencyPenalty})
  }

  setPresencePenalty(presencePenalty: number): this {
    return this.withOptions({presencePenalty})
  }

  withOptions(options: RequestConfig): this {
    this.config = mergeRequestConfig(this.config, options)
    return this
  }

  getConfig(): RequestConfig {
    return this.config
  }

  getModelId(): ModelId {
    return this.session.modelId
  }

  protected async exchange(
    kind: CompletionKind,
    input: MessageInput,
    extra: ExchangeRequest,
    options: CompleteOptions,
    map: (reply: ProviderReply, usage: Usage, model: string) => TResponse
  ): Promise<TResponse> {
    const messages = toMessageList(input)
    assertToolTurns(messages)

    const {provider, modelId, bus} = this.session
    const exchangeId = randomUUID()
    const base = {exchangeId, provider: provider.name, model: modelId.model, kind}
    bus?.publish({
      type: 'request_start',
      ...base,
      messageCount: messages.length,
      toolCount: extra.tools?.length ?? 0
    })

    const startedAt = Date.now()
    try {
      const reply = await provider.completeChat({
        model: modelId.model,
        messages,
        config: this.config,
        ...extra,
        ...(options.signal ? {signal: options.signal} : {})
      })
      const response = map(reply, usageFromReply(reply), reply.model ?? modelId.model)
      bus?.publish({
        type: 'response',
        ...base,
        finishReason: response.finishReason,
        toolCallCount: response instanceof ToolResponse ? response.toolCalls.length : 0,
        usage: response.usage.toRecord(),
        durationMs: Date.now() - startedAt
      })
      return response
    } catch (error) {
      const failure = asTooltalkError(error)
      bus?.publish({
        type: 'error',
        ...base,
        code: failure.code,
        message: failure.message,
        durationMs: Date.now() - startedAt
      })
      throw failure
    }
  }
}

export class PlainBuilder extends CompletionBuilder<Response> {
  constructor(session: SessionContext, config: RequestConfig = {}) {
    super(session, config)
  }

  async complete(messages: MessageInput, options: CompleteOptions = {}): Promise<Response> {
    return this.exchange(
      'plain',
      messages,
      {},
      options,
      (reply, usage, model) => new Response(reply.content, usage, model, reply.finishReason)
    )
  }
}

function normalizeSchema(schema: JsonObject | string): JsonObject {
  const value = typeof schema === 'string' ? parseJsonText(schema, 'schema') : schema
  if (!isJsonObject(value)) {
    throw new ValidationError('Structured output schema must be a JSON object')
  }
  return freezeJson(value)
}

export class StructuredBuilder extends CompletionBuilder<StructuredResponse> {
  private schema?: JsonObject
  private format?: StructuredFormat

  constructor(session: SessionContext, config: RequestConfig = {}, schema?: JsonObject | string) {
    super(session, config)
    if (schema !== undefined) this.schema = normalizeSchema(schema)
  }

  withSchema(schema: JsonObject | string): this {
    this.schema = normalizeSchema(schema)
    return this
  }

  withFormat(format: string): this {
    if (format !== 'json' && format !== 'json_schema') {
      throw new ValidationError(`Structured output format must be 'json' or 'json_schema', got '${format}'`)
    }
    this.format = format
    return this
  }

  getSchema(): JsonObject | undefined {
    return this.schema
  }

  /** The explicit format if one was set, otherwise `json_schema` when a schema is present. */
  getFormat(): StructuredFormat {
    return this.format ?? (this.schema ? 'json_schema' : 'json')
  }

  async complete(messages: MessageInput, options: CompleteOptions = {}): Promise<StructuredResponse> {
    const responseFormat = this.responseFormat()
    return this.exchange('structured', messages, {responseFormat}, options, (reply, usage, model) =>
      parseStructuredReply(reply, usage, model)
    )
  }

  private responseFormat(): ResponseFormat {
    if (this.getFormat() === 'json') return {type: 'json'}
    if (!this.schema) {
      throw new ValidationError("Structured output format 'json_schema' requires a schema")
    }
    return {type: 'json_schema', schema: this.schema}
  }
}

function parseStructuredReply(reply: ProviderReply, usage: Usage, model: string): StructuredResponse {
  // Some vendors return the structured value out of band with empty text content; the text is kept as sent.
  if (!reply.content.trim() && reply.structured !== undefined) {
    return new StructuredResponse(reply.content, reply.structured, usage, model, reply.finishReason)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(reply.content)
  } catch (error) {
    throw new StructuredOutputError(`Structured output is not valid JSON: ${errorMessage(error)}`, {
      rawText: reply.content,
      usage,
      model,
      cause: error
    })
  }
  if (!isJsonValue(parsed)) {
    throw new StructuredOutputError('Structured output is not a JSON value', {rawText: reply.content, usage, model})
  }
  return new StructuredResponse(reply.content, parsed, usage, model, reply.finishReason)
}

function toToolDefinition(tool: ToolInput): ToolDefinition {
  return tool instanceof ToolDefinition ? tool : ToolDefinition.fromRecord(tool)
}

function assertUniqueNames(tools: readonly ToolDefinition[]): void {
  const seen = new Set<string>()
  for (const tool of tools) {
    if (seen.has(tool.name)) {
      throw new ValidationError(`Tool '${tool.name}' is defined more than once`)
    }
    seen.add(tool.name)
  }
}

export class ToolBuilder extends CompletionBuilder<ToolResponse> {
  private tools: ToolDefinition[] = []
  private autoExecute = false

  constructor(session: SessionContext, config: RequestConfig = {}, tools: readonly ToolInput[] = []) {
    super(session, config)
    this.setTools(tools)
  }

  addTool(tool: ToolInput): this {
    const next = [...this.tools, toToolDefinition(tool)]
    assertUniqueNames(next)
    this.tools = next
    return this
  }

  setTools(tools: readonly ToolInput[]): this {
    const next = tools.map((tool) => toToolDefinition(tool))
    assertUniqueNames(next)
    this.tools = next
    return this
  }

  getTools(): readonly ToolDefinition[] {
    return [...this.tools]
  }

  /** Reserved. Stored and reported, but tools are never executed by this library. */
  setAutoExecute(autoExecute: boolean): this {
    this.autoExecute = autoExecute
    return this
  }

  isAutoExecute(): boolean {
    return this.autoExecute
  }

  async complete(messages: MessageInput, options: CompleteOptions = {}): Promise<ToolResponse> {
    const offered = [...this.tools]
    const names = new Set(offered.map((tool) => tool.name))
    return this.exchange(
      'tool',
      messages,
      offered.length > 0 ? {tools: offered} : {},
      options,
      (reply, usage, model) => {
        const calls = (reply.toolCalls ?? []).map((call) => new ToolCall(call.id, call.name, call.arguments, call.rawArguments))
        const response = new ToolResponse(reply.content, calls, usage, model, reply.finishReason, reply.responseId)
        const unknown = calls.find((call) => !names.has(call.name))
        if (unknown) {
          throw new ToolCallError(`Model called unknown tool '${unknown.name}'`, unknown.id, response)
        }
        return response
      }
    )
  }
}
