import {z} from 'zod'
import {ValidationError, formatZodError} from './errors.js'
import {freezeJson, isJsonObject, isJsonValue, parseJsonText, tryParseJson, type JsonObject, type JsonValue} from './json.js'

const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/

export type ToolRecord = {
  name: string
  description: string
  parameters: JsonObject
}

export type ToolCallRecord = {
  id: string
  name: string
  arguments: JsonValue
  raw_arguments?: string
}

const toolRecordSchema = z.object({
  name: z.string({required_error: "Tool must have 'name' field"}),
  description: z.string({required_error: "Tool must have 'description' field"}),
  parameters: z.unknown().refine((value) => value !== undefined, "Tool must have 'parameters' field")
})

const toolCallRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  arguments: z.unknown(),
  raw_arguments: z.string().nullish()
})

export type ToolParameters = JsonObject | string

function normalizeParameters(name: string, parameters: unknown): JsonObject {
  const value = typeof parameters === 'string' ? tryParseJson(parameters) : parameters
  if (value === undefined && typeof parameters === 'string') {
    throw new ValidationError(`Tool '${name}' parameters are not valid JSON`)
  }
  if (!isJsonObject(value) || !isJsonValue(value)) {
    throw new ValidationError(`Tool '${name}' parameters must be a JSON object`)
  }
  if (value.type !== 'object') {
    throw new ValidationError(`Tool '${name}' parameters must declare "type": "object"`)
  }
  return freezeJson(value)
}

/** A function contract offered to the model. Immutable once constructed. */
export class ToolDefinition {
  readonly name: string
  readonly description: string
  readonly parameters: JsonObject

  constructor(name: string, description: string, parameters: ToolParameters) {
    if (!TOOL_NAME_PATTERN.test(name)) {
      throw new ValidationError(
        `Tool name '${name}' must be 1-64 characters of letters, digits, underscores or dashes`
      )
    }
    this.name = name
    this.description = description
    this.parameters = normalizeParameters(name, parameters)
    Object.freeze(this)
  }

  /** Builds a definition from an untyped map, e.g. one read from a config file. */
  static fromRecord(data: unknown): ToolDefinition {
    const parsed = toolRecordSchema.safeParse(data)
    if (!parsed.success) {
      throw new ValidationError(`Invalid tool record: ${formatZodError(parsed.error)}`, parsed.error)
    }
    const {name, description, parameters} = parsed.data
    if (typeof parameters !== 'string' && !isJsonObject(parameters)) {
      throw new ValidationError('Parameters must be a string or object')
    }
    return new ToolDefinition(name, description, parameters)
  }

  static fromJson(text: string): ToolDefinition {
    return ToolDefinition.fromRecord(parseJsonText(text, 'tool'))
  }

  getName(): string {
    return this.name
  }

  getDescription(): string {
    return this.description
  }

  getParameters(): JsonObject {
    return this.parameters
  }

  toRecord(): ToolRecord {
    return {name: this.name, description: this.description, parameters: this.parameters}
  }

  toJson(): string {
    return JSON.stringify(this.toRecord())
  }
}

/**
 * A model-issued request to invoke a tool. Produced when a provider reply is mapped;
 * `arguments` is passed through without checking it against the tool's schema.
 *
 * `rawArguments` is set only when the vendor's argument text was not valid JSON. It is
 * what gets replayed, so it stays distinct from arguments that parsed to a JSON string.
 */
export class ToolCall {
  readonly id: string
  readonly name: string
  readonly arguments: JsonValue
  readonly rawArguments?: string

  constructor(id: string, name: string, args: JsonValue, rawArguments?: string) {
    this.id = id
    this.name = name
    this.arguments = freezeJson(args)
    if (rawArguments !== undefined) this.rawArguments = rawArguments
    Object.freeze(this)
  }

  static fromRecord(data: unknown): ToolCall {
    const parsed = toolCallRecordSchema.safeParse(data)
    if (!parsed.success) {
      throw new ValidationError(`Invalid tool call record: ${formatZodError(parsed.error)}`, parsed.error)
    }
    const args = parsed.data.arguments
    if (args === undefined || !isJsonValue(args)) {
      throw new ValidationError('Invalid tool call record: arguments must be a JSON value')
    }
    return new ToolCall(parsed.data.id, parsed.data.name, args, parsed.data.raw_arguments ?? undefined)
  }

  static fromJson(text: string): ToolCall {
    return ToolCall.fromRecord(parseJsonText(text, 'tool call'))
  }

  getId(): string {
    return this.id
  }

  getName(): string {
    return this.name
  }

  getArguments(): JsonValue {
    return this.arguments
  }

  getRawArguments(): string | undefined {
    return this.rawArguments
  }

  toRecord(): ToolCallRecord {
    return {
      id: this.id,
      name: this.name,
      arguments: this.arguments,
      ...(this.rawArguments !== undefined ? {raw_arguments: this.rawArguments} : {})
    }
  }

  toJson(): string {
    return JSON.stringify(this.toRecord())
  }
}
