import {describe, expect, it} from 'vitest'
import {ToolCallError, ValidationError} from '../src/core/errors.js'
import {
  MessageCollection,
  assistantMessage,
  messageFromJson,
  messageFromRecord,
  messageToJson,
  userMessage
} from '../src/core/message.js'
import {ToolResponse} from '../src/core/response.js'
import {ToolCall} from '../src/core/tool.js'
import {assertToolTurns} from '../src/core/tool-turns.js'
import {Usage} from '../src/core/usage.js'

function weatherResponse(): ToolResponse {
  return new ToolResponse(
    '',
    [new ToolCall('call_1', 'get_weather', {city: 'Paris'})],
    new Usage(20, 8),
    'gpt-4o-mini',
    'tool_calls',
    'resp_1'
  )
}

describe('MessageCollection', () => {
  it('keeps insertion order and returns copies from all()', () => {
    const messages = new MessageCollection().appendSystem('Be brief').appendUser('Hello').appendAssistant('Hi')

    expect(messages.count()).toBe(3)
    expect(messages.get(0)).toEqual({role: 'system', content: 'Be brief'})
    expect(messages.get(2)).toEqual({role: 'assistant', content: 'Hi'})
    expect(messages.get(3)).toBeUndefined()
    expect(messages.get(-1)).toBeUndefined()
    expect(messages.get(0.5)).toBeUndefined()

    const snapshot = messages.all()
    messages.appendUser('Again')
    expect(snapshot).toHaveLength(3)
    expect(messages.count()).toBe(4)
  })

  it('freezes every appended message', () => {
    const messages = new MessageCollection().appendUser('Hello')
    expect(Object.isFrozen(messages.get(0))).toBe(true)
  })

  it('rejects tool results without a call id', () => {
    const messages = new MessageCollection()
    expect(() => messages.appendToolResult('', 'Sunny')).toThrow(ValidationError)
    expect(() => messages.appendToolResult('  ', 'Sunny')).toThrow('Tool message must have tool_call_id')
    expect(messages.count()).toBe(0)
  })

  it('replays a tool-calling response with its id and calls', () => {
    const messages = new MessageCollection().appendUser("What's the weather in Paris?")
    const replay = messages.fromResponse(weatherResponse())
    messages.appendToolResult('call_1', 'Sunny, 22C')

    expect(messages.count()).toBe(3)
    expect(replay.id).toBe('resp_1')
    expect(replay.toolCalls?.map((call) => call.id)).toEqual(['call_1'])
    expect(Object.isFrozen(replay.toolCalls)).toBe(true)
    expect(messages.get(1)).toBe(replay)
    expect(() => assertToolTurns(messages.all())).not.toThrow()
  })

  it('serializes with snake_case keys in wire order', () => {
    const messages = new MessageCollection().appendUser('Weather?')
    messages.fromResponse(weatherResponse())
    messages.appendToolResult('call_1', 'Sunny')
    const records = messages.toRecords()

    expect(records[1]).toEqual({
      role: 'assistant',
      content: '',
      tool_calls: [{id: 'call_1', name: 'get_weather', arguments: {city: 'Paris'}}],
      id: 'resp_1'
    })
    expect(Object.keys(records[1] ?? {})).toEqual(['role', 'content', 'tool_calls', 'id'])
    expect(records[2]).toEqual({role: 'tool', content: 'Sunny', tool_call_id: 'call_1'})
    expect(messages.toJson()).toBe(JSON.stringify(records))
  })

  it('restores a collection from its JSON form', () => {
    const messages = new MessageCollection().appendSystem('Be brief').appendUser('Weather?')
    messages.fromResponse(weatherResponse())
    messages.appendToolResult('call_1', 'Sunny')

    const restored = MessageCollection.fromJson(messages.toJson())
    expect(restored.count()).toBe(4)
    expect(restored.toRecords()).toEqual(messages.toRecords())
    const replay = restored.get(2)
    expect(replay?.role === 'assistant' ? replay.toolCalls?.[0]?.arguments : undefined).toEqual({city: 'Paris'})
  })

  it('rejects non-array input when restoring', () => {
    expect(() => MessageCollection.fromRecords({role: 'user'})).toThrow('Messages must be an array')
    expect(() => MessageCollection.fromJson('[{')).toThrow(ValidationError)
  })
})

describe('message records', () => {
  it('omits absent optional keys', () => {
    expect(messageToJson(userMessage('hi'))).toBe('{"role":"user","content":"hi"}')
    expect(messageToJson(assistantMessage('ok'))).toBe('{"role":"assistant","content":"ok"}')
  })

  it('treats null optional fields as absent', () => {
    expect(messageFromRecord({role: 'assistant', content: 'ok', tool_calls: null, id: null})).toEqual({
      role: 'assistant',
      content: 'ok'
    })
  })

  it('requires role and content', () => {
    expect(() => messageFromRecord({content: 'hi'})).toThrow("Message must have 'role' field")
    expect(() => messageFromRecord({role: 'user'})).toThrow("Message must have 'content' field")
    expect(() => messageFromRecord({role: 'robot', content: 'hi'})).toThrow('Invalid message role: robot')
  })

  it('keeps role-specific fields on their own role', () => {
    expect(() => messageFromRecord({role: 'user', content: 'hi', tool_call_id: 'call_1'})).toThrow(
      "Message with role 'user' cannot carry tool_call_id"
    )
    expect(() => messageFromRecord({role: 'tool', content: 'hi', id: 'resp_1'})).toThrow(
      "Message with role 'tool' cannot carry tool_calls or id"
    )
    expect(() => messageFromRecord({role: 'tool', content: 'hi'})).toThrow('Tool message must have tool_call_id')
  })

  it('parses a tool message from JSON', () => {
    expect(messageFromJson('{"role":"tool","content":"Sunny","tool_call_id":"call_1"}')).toEqual({
      role: 'tool',
      content: 'Sunny',
      toolCallId: 'call_1'
    })
  })
})

describe('assertToolTurns', () => {
  const replay = assistantMessage('', {
    toolCalls: [new ToolCall('call_1', 'get_weather', {city: 'Paris'}), new ToolCall('call_2', 'get_weather', {city: 'Rome'})]
  })

  it('accepts results answering the replayed calls in order', () => {
    const messages = new MessageCollection([userMessage('Weather?'), replay])
      .appendToolResult('call_1', 'Sunny')
      .appendToolResult('call_2', 'Rainy')
      .appendUser('Thanks')
    expect(() => assertToolTurns(messages.all())).not.toThrow()
  })

  it('rejects a result that precedes its replay', () => {
    const messages = new MessageCollection().appendUser('Weather?').appendToolResult('call_1', 'Sunny')
    expect(() => assertToolTurns(messages.all())).toThrow(ToolCallError)
    expect(() => assertToolTurns(messages.all())).toThrow(
      "Tool result at index 1 for call 'call_1' is not preceded by an assistant replay of that call"
    )
  })

  it('rejects results out of order', () => {
    const messages = new MessageCollection([replay]).appendToolResult('call_2', 'Rainy')
    expect(() => assertToolTurns(messages.all())).toThrow("answers call 'call_2' but call 'call_1' is next")
  })

  it('rejects a new turn while calls are unanswered', () => {
    const messages = new MessageCollection([replay]).appendToolResult('call_1', 'Sunny').appendUser('Hello?')
    expect(() => assertToolTurns(messages.all())).toThrow('Message at index 2 follows unanswered tool call(s): call_2')
  })

  it('rejects a conversation ending with unanswered calls', () => {
    expect(() => assertToolTurns([replay])).toThrow('Conversation ends with unanswered tool call(s): call_1, call_2')
  })
})
