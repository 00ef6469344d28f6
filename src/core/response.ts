import {z} from 'zod'
import {ValidationError, formatZodError} from './errors.js'
import {freezeJson, isJsonValue, parseJsonText, type JsonValue} from './json.js'
import {ToolCall, type ToolCallRecord} from './tool.js'
import {Usage, usageRecordSchema, type UsageRecord} from './usage.js'

export type ResponseRecord = {
  content: string
  usage: UsageRecord
  model: string
  finish_reason: string
}

export type StructuredResponseRecord = ResponseRecord & {structured: JsonValue}

export type ToolResponseRecord = ResponseRecord & {
  tool_calls: ToolCallRecord[]
  response_id?: string
}

const responseRecordSchema = z.object({
  content: z.string(),
  usage: usageRecordSchema,
  model: z.string(),
  finish_reason: z.string()
})

const structuredResponseRecordSchema = responseRecordSchema.extend({
  structured: z.unknown()
})

const toolResponseRecordSchema = responseRecordSchema.extend({
  tool_calls: z.array(z.unknown()),
  response_id: z.string().nullish()
})

function parseRecord<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.infer<T> {
  const parsed = schema.safeParse(data)
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${what} record: ${formatZodError(parsed.error)}`, parsed.error)
  }
  return parsed.data
}

function usageFrom(record: z.infer<typeof usageRecordSchema>): Usage {
  return new Usage(record.prompt_tokens, record.output_tokens, record.total_tokens)
}

export class Response {
  constructor(
    readonly content: string,
    readonly usage: Usage,
    readonly model: string,
    readonly finishReason: string
  ) {}

  static fromRecord(data: unknown): Response {
    const record = parseRecord(responseRecordSchema, data, 'response')
    return new Response(record.content, usageFrom(record.usage), record.model, record.finish_reason)
  }

  static fromJson(text: string): Response {
    return Response.fromRecord(parseJsonText(text, 'response'))
  }

  getContent(): string {
    return this.content
  }

  getUsage(): Usage {
    return this.usage
  }

  getModel(): string {
    return this.model
  }

  getFinishReason(): string {
    return this.finishReason
  }

  toRecord(): ResponseRecord {
    return {
      content: this.content,
      usage: this.usage.toRecord(),
      model: this.model,
      finish_reason: this.finishReason
    }
  }

  toJson(): string {
    return JSON.stringify(this.toRecord())
  }
}

export class StructuredResponse extends Response {
  readonly structured: JsonValue

  constructor(content: string, structured: JsonValue, usage: Usage, model: string, finishReason: string) {
    super(content, usage, model, finishReason)
    this.structured = freezeJson(structured)
  }

  static override fromRecord(data: unknown): StructuredResponse {
    const record = parseRecord(structuredResponseRecordSchema, data, 'structured response')
    const structured: unknown = record.structured
    if (structured === undefined || !isJsonValue(structured)) {
      throw new ValidationError("Invalid structured response record: 'structured' must be a JSON value")
    }
    return new StructuredResponse(
      record.content,
      structured,
      usageFrom(record.usage),
      record.model,
      record.finish_reason
    )
  }

  static override fromJson(text: string): StructuredResponse {
    return StructuredResponse.fromRecord(parseJsonText(text, 'structured response'))
  }

  getStructured(): JsonValue {
    return this.structured
  }

  override toRecord(): StructuredResponseRecord {
    return {...super.toRecord(), structured: this.structured}
  }
}

export class ToolResponse extends Response {
  readonly toolCalls: readonly ToolCall[]

  constructor(
    content: string,
    toolCalls: readonly ToolCall[],
    usage: Usage,
    model: string,
    finishReason: string,
    readonly responseId?: string
  ) {
    super(content, usage, model, finishReason)
    this.toolCalls = Object.freeze([...toolCalls])
  }

  static override fromRecord(data: unknown): ToolResponse {
    const record = parseRecord(toolResponseRecordSchema, data, 'tool response')
    return new ToolResponse(
      record.content,
      record.tool_calls.map((call) => ToolCall.fromRecord(call)),
      usageFrom(record.usage),
      record.model,
      record.finish_reason,
      record.response_id ?? undefined
    )
  }

  static override fromJson(text: string): ToolResponse {
    return ToolResponse.fromRecord(parseJsonText(text, 'tool response'))
  }

  getToolCalls(): readonly ToolCall[] {
    return this.toolCalls
  }

  getResponseId(): string | undefined {
    return this.responseId
  }

  hasToolCalls(): boolean {
    return this.toolCalls.length > 0
  }

  override toRecord(): ToolResponseRecord {
    return {
      ...super.toRecord(),
      tool_calls: this.toolCalls.map((call) => call.toRecord()),
      ...(this.responseId !== undefined ? {response_id: this.responseId} : {})
    }
  }
}
