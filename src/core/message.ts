import {z} from 'zod'
import {ValidationError, formatZodError} from './errors.js'
import {parseJsonText} from './json.js'
import type {ToolResponse} from './response.js'
import {ToolCall, type ToolCallRecord} from './tool.js'

export type SystemMessage = {readonly role: 'system'; readonly content: string}

export type UserMessage = {readonly role: 'user'; readonly content: string}

export type AssistantMessage = {
  readonly role: 'assistant'
  readonly content: string
  /** Provider-assigned exchange id, kept so a tool-call request can be replayed verbatim. */
  readonly id?: string
  readonly toolCalls?: readonly ToolCall[]
}

export type ToolMessage = {readonly role: 'tool'; readonly content: string; readonly toolCallId: string}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage

export type Role = Message['role']

export type MessageRecord = {
  role: Role
  content: string
  tool_calls?: ToolCallRecord[]
  id?: string
  tool_call_id?: string
}

const messageRecordSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool'], {
    errorMap: (issue, ctx) =>
      issue.code === 'invalid_type' && ctx.data === undefined
        ? {message: "Message must have 'role' field"}
        : {message: `Invalid message role: ${String(ctx.data)}`}
  }),
  content: z.string({required_error: "Message must have 'content' field"}),
  tool_calls: z.array(z.unknown()).nullish(),
  id: z.string().nullish(),
  tool_call_id: z.string().nullish()
})

export function systemMessage(content: string): SystemMessage {
  const message: SystemMessage = {role: 'system', content}
  return Object.freeze(message)
}

export function userMessage(content: string): UserMessage {
  const message: UserMessage = {role: 'user', content}
  return Object.freeze(message)
}

export function assistantMessage(
  content: string,
  extra: {id?: string; toolCalls?: readonly ToolCall[]} = {}
): AssistantMessage {
  const message: AssistantMessage = {
    role: 'assistant',
    content,
    ...(extra.id !== undefined ? {id: extra.id} : {}),
    ...(extra.toolCalls !== undefined ? {toolCalls: Object.freeze([...extra.toolCalls])} : {})
  }
  return Object.freeze(message)
}

export function toolMessage(toolCallId: string, result: string): ToolMessage {
  if (!toolCallId.trim()) {
    throw new ValidationError('Tool message must have tool_call_id')
  }
  const message: ToolMessage = {role: 'tool', content: result, toolCallId}
  return Object.freeze(message)
}

/**
 * Rebuilds the assistant turn of a tool-calling response. Providers reject tool results
 * that are not preceded by an exact replay of their own request, so the response id
 * and every call are carried over unchanged.
 */
export function messageFromResponse(response: ToolResponse): AssistantMessage {
  return assistantMessage(response.content, {
    id: response.responseId,
    toolCalls: response.hasToolCalls() ? response.toolCalls : undefined
  })
}

export function messageFromRecord(data: unknown): Message {
  const parsed = messageRecordSchema.safeParse(data)
  if (!parsed.success) {
    throw new ValidationError(`Invalid message: ${formatZodError(parsed.error)}`, parsed.error)
  }

  const {role, content} = parsed.data
  const id = parsed.data.id ?? undefined
  const toolCallId = parsed.data.tool_call_id ?? undefined
  const rawCalls = parsed.data.tool_calls ?? undefined

  if (role !== 'tool' && toolCallId !== undefined) {
    throw new ValidationError(`Message with role '${role}' cannot carry tool_call_id`)
  }
  if (role !== 'assistant' && (rawCalls !== undefined || id !== undefined)) {
    throw new ValidationError(`Message with role '${role}' cannot carry tool_calls or id`)
  }

  switch (role) {
    case 'system':
      return systemMessage(content)
    case 'user':
      return userMessage(content)
    case 'assistant':
      return assistantMessage(content, {
        id,
        toolCalls: rawCalls?.map((call) => ToolCall.fromRecord(call))
      })
    case 'tool':
      return toolMessage(toolCallId ?? '', content)
  }
}

export function messageToRecord(message: Message): MessageRecord {
  switch (message.role) {
    case 'system':
    case 'user':
      return {role: message.role, content: message.content}
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content,
        ...(message.toolCalls ? {tool_calls: message.toolCalls.map((call) => call.toRecord())} : {}),
        ...(message.id !== undefined ? {id: message.id} : {})
      }
    case 'tool':
      return {role: 'tool', content: message.content, tool_call_id: message.toolCallId}
  }
}

export function messageToJson(message: Message): string {
  return JSON.stringify(messageToRecord(message))
}

export function messageFromJson(text: string): Message {
  return messageFromRecord(parseJsonText(text, 'message'))
}

/** Ordered, append-only conversation history. */
export class MessageCollection {
  private readonly messages: Message[] = []

  constructor(messages: Iterable<Message> = []) {
    for (const message of messages) this.messages.push(message)
  }

  static fromRecords(data: unknown): MessageCollection {
    if (!Array.isArray(data)) {
      throw new ValidationError('Messages must be an array')
    }
    return new MessageCollection(data.map((item) => messageFromRecord(item)))
  }

  static fromJson(text: string): MessageCollection {
    return MessageCollection.fromRecords(parseJsonText(text, 'messages'))
  }

  append(message: Message): this {
    this.messages.push(message)
    return this
  }

  appendSystem(content: string): this {
    return this.append(systemMessage(content))
  }

  appendUser(content: string): this {
    return this.append(userMessage(content))
  }

  appendAssistant(content: string): this {
    return this.append(assistantMessage(content))
  }

  appendToolResult(toolCallId: string, result: string): this {
    return this.append(toolMessage(toolCallId, result))
  }

  /** Appends the replay of a tool-calling response and returns it. */
  fromResponse(response: ToolResponse): AssistantMessage {
    const message = messageFromResponse(response)
    this.messages.push(message)
    return message
  }

  get(index: number): Message | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.messages.length) return undefined
    return this.messages[index]
  }

  all(): readonly Message[] {
    return [...this.messages]
  }

  count(): number {
    return this.messages.length
  }

  toRecords(): MessageRecord[] {
    return this.messages.map((message) => messageToRecord(message))
  }

  toJson(): string {
    return JSON.stringify(this.toRecords())
  }
}
