import {afterEach, describe, expect, it, vi} from 'vitest'
import {ConnectionError, StructuredOutputError, ToolCallError, ValidationError} from '../src/core/errors.js'
import {InMemoryEventBus} from '../src/core/event-bus.js'
import type {ClientEvent} from '../src/core/events.js'
import {LLM} from '../src/core/llm.js'
import {MessageCollection} from '../src/core/message.js'
import {ToolDefinition} from '../src/core/tool.js'
import {createProvider} from '../src/providers/factory.js'
import {MockProvider} from '../src/providers/mock-provider.js'

const weatherTool = new ToolDefinition('get_weather', 'Current weather for a city', {
  type: 'object',
  properties: {location: {type: 'string'}},
  required: ['location']
})

function hello(): MessageCollection {
  return new MessageCollection().appendUser('Hello')
}

describe('PlainBuilder via LLM', () => {
  it('echoes the last message when the mock script is empty', async () => {
    const provider = new MockProvider()
    const llm = new LLM('mock:echo', {provider})

    const response = await llm.complete(hello())

    expect(response.content).toBe('Mock response: Hello')
    expect(response.model).toBe('echo')
    expect(response.finishReason).toBe('stop')
    expect(response.usage.getTotalTokens()).toBe(0)
    expect(llm.getProviderName()).toBe('mock')
    expect(provider.requests[0]?.model).toBe('echo')
  })

  it('accepts a plain message array', async () => {
    const provider = new MockProvider()
    const response = await new LLM('mock:echo', {provider}).complete([])
    expect(response.content).toBe('No input provided.')
  })

  it('chains setters on the same builder and forwards the config', async () => {
    const provider = new MockProvider()
    const llm = new LLM('mock:echo', {provider})

    expect(llm.setTemperature(0.2).setMaxTokens(50).setTopP(0.9)).toBe(llm)
    await llm.complete(hello())

    expect(provider.requests[0]?.config).toEqual({temperature: 0.2, maxTokens: 50, topP: 0.9})
  })

  it('rejects an out-of-range setting and keeps the previous config', () => {
    const llm = new LLM('mock:echo', {provider: new MockProvider()}).setTemperature(1)
    expect(() => llm.setTemperature(3)).toThrow(ValidationError)
    expect(() => llm.setMaxTokens(-5)).toThrow(ValidationError)
    expect(() => llm.setFrequencyPenalty(2.5)).toThrow(ValidationError)
    expect(() => llm.setPresencePenalty(-3)).toThrow(ValidationError)
    expect(llm.getConfig()).toEqual({temperature: 1})
  })

  it('hands its current config to derived builders', () => {
    const llm = new LLM('mock:echo', {provider: new MockProvider(), config: {maxTokens: 10}}).setTemperature(0.1)
    const tools = llm.withTools()
    tools.setTemperature(0.9)

    expect(tools.getConfig()).toEqual({maxTokens: 10, temperature: 0.9})
    expect(llm.getConfig()).toEqual({maxTokens: 10, temperature: 0.1})
    expect(llm.structured().getConfig()).toEqual({maxTokens: 10, temperature: 0.1})
  })

  it('wraps provider failures in ConnectionError', async () => {
    const failure = new Error('socket hang up')
    const llm = new LLM('mock:echo', {provider: new MockProvider([failure])})

    const error = await llm.complete(hello()).catch((caught: unknown) => caught)

    if (!(error instanceof ConnectionError)) throw new Error('expected ConnectionError')
    expect(error.message).toBe('socket hang up')
    expect(error.code).toBe('CONNECTION_ERROR')
    expect(error.cause).toBe(failure)
    expect(error.status).toBeUndefined()
  })
})

describe('StructuredBuilder', () => {
  const personSchema = {type: 'object', properties: {name: {type: 'string'}}}

  it('parses JSON content and requests the schema', async () => {
    const provider = new MockProvider([
      {content: '{"name":"Ada"}', finishReason: 'stop', usage: {promptTokens: 12, outputTokens: 4}}
    ])
    const builder = new LLM('mock:echo', {provider}).structured(personSchema)

    const response = await builder.complete(hello())

    expect(response.getStructured()).toEqual({name: 'Ada'})
    expect(response.content).toBe('{"name":"Ada"}')
    expect(response.usage.getTotalTokens()).toBe(16)
    expect(builder.getFormat()).toBe('json_schema')
    expect(provider.requests[0]?.responseFormat).toEqual({type: 'json_schema', schema: personSchema})
  })

  it('asks for plain JSON when no schema is given', async () => {
    const provider = new MockProvider([{content: '[1,2]', finishReason: 'stop'}])
    const builder = new LLM('mock:echo', {provider}).structured()

    const response = await builder.complete(hello())

    expect(response.getStructured()).toEqual([1, 2])
    expect(provider.requests[0]?.responseFormat).toEqual({type: 'json'})
  })

  it('accepts the schema as JSON text', () => {
    const builder = new LLM('mock:echo', {provider: new MockProvider()}).structured().withSchema(JSON.stringify(personSchema))
    expect(builder.getSchema()).toEqual(personSchema)
    expect(() => builder.withSchema('"just a string"')).toThrow('Structured output schema must be a JSON object')
  })

  it('validates the format', async () => {
    const provider = new MockProvider()
    const builder = new LLM('mock:echo', {provider}).structured()

    expect(() => builder.withFormat('xml')).toThrow("Structured output format must be 'json' or 'json_schema', got 'xml'")
    await expect(builder.withFormat('json_schema').complete(hello())).rejects.toThrow(
      "Structured output format 'json_schema' requires a schema"
    )
    expect(provider.requests).toHaveLength(0)
  })

  it('attaches raw text and usage when content is not JSON', async () => {
    const provider = new MockProvider([
      {content: 'not-json', finishReason: 'stop', usage: {promptTokens: 5, outputTokens: 2, totalTokens: 7}}
    ])
    const error = await new LLM('mock:echo', {provider})
      .structured(personSchema)
      .complete(hello())
      .catch((caught: unknown) => caught)

    if (!(error instanceof StructuredOutputError)) throw new Error('expected StructuredOutputError')
    expect(error.rawText).toBe('not-json')
    expect(error.usage.getTotalTokens()).toBe(7)
    expect(error.model).toBe('echo')
    expect(error.code).toBe('STRUCTURED_OUTPUT_ERROR')
  })

  it('uses an out-of-band structured value when content is empty', async () => {
    const provider = new MockProvider([{content: '', structured: {ok: true}, finishReason: 'stop'}])
    const response = await new LLM('mock:echo', {provider}).structured().complete(hello())

    expect(response.getStructured()).toEqual({ok: true})
    expect(response.content).toBe('')
  })
})

describe('ToolBuilder', () => {
  it('runs a full tool round trip', async () => {
    const provider = new MockProvider([
      {
        content: '',
        finishReason: 'tool_calls',
        toolCalls: [{id: 'call_1', name: 'get_weather', arguments: {location: 'Paris'}}],
        responseId: 'resp_1',
        usage: {promptTokens: 20, outputTokens: 8, totalTokens: 28}
      },
      {content: 'It is 18 degrees in Paris.', finishReason: 'stop'}
    ])
    const builder = new LLM('mock:gpt', {provider}).withTools([weatherTool])
    const messages = new MessageCollection()
      .appendSystem('You are a weather assistant.')
      .appendUser("What's the weather in Paris?")
    expect(messages.count()).toBe(2)

    const first = await builder.complete(messages)
    expect(first.hasToolCalls()).toBe(true)
    expect(first.getResponseId()).toBe('resp_1')
    expect(first.toolCalls[0]?.arguments).toEqual({location: 'Paris'})

    messages.fromResponse(first)
    messages.appendToolResult('call_1', JSON.stringify({temp: 18}))
    expect(messages.count()).toBe(4)
    expect(messages.get(3)).toEqual({role: 'tool', content: '{"temp":18}', toolCallId: 'call_1'})

    const second = await builder.complete(messages)
    expect(second.hasToolCalls()).toBe(false)
    expect(second.content).toBe('It is 18 degrees in Paris.')

    expect(provider.requests[0]?.tools?.map((tool) => tool.name)).toEqual(['get_weather'])
    expect(provider.requests[1]?.messages.map((message) => message.role)).toEqual([
      'system',
      'user',
      'assistant',
      'tool'
    ])
  })

  it('refuses to send a result before its replay', async () => {
    const provider = new MockProvider()
    const messages = new MessageCollection().appendUser('Weather?').appendToolResult('call_9', 'Sunny')

    await expect(new LLM('mock:gpt', {provider}).withTools([weatherTool]).complete(messages)).rejects.toThrow(
      ToolCallError
    )
    expect(provider.requests).toHaveLength(0)
  })

  it('rejects calls to tools that were not offered', async () => {
    const provider = new MockProvider([
      {content: '', finishReason: 'tool_calls', toolCalls: [{id: 'call_x', name: 'delete_everything', arguments: {}}]}
    ])
    const error = await new LLM('mock:gpt', {provider})
      .withTools([weatherTool])
      .complete(hello())
      .catch((caught: unknown) => caught)

    if (!(error instanceof ToolCallError)) throw new Error('expected ToolCallError')
    expect(error.message).toBe("Model called unknown tool 'delete_everything'")
    expect(error.toolCallId).toBe('call_x')
    expect(error.response?.toolCalls).toHaveLength(1)
  })

  it('sends no tools when none are set', async () => {
    const provider = new MockProvider()
    const response = await new LLM('mock:gpt', {provider}).withTools().complete(hello())

    expect(response.hasToolCalls()).toBe(false)
    expect(provider.requests[0]?.tools).toBeUndefined()
  })

  it('keeps tool names unique', () => {
    const builder = new LLM('mock:gpt', {provider: new MockProvider()}).withTools([weatherTool])
    expect(() => builder.addTool(weatherTool)).toThrow("Tool 'get_weather' is defined more than once")
    builder.addTool({name: 'get_time', description: 'Clock', parameters: '{"type":"object"}'})
    expect(builder.getTools().map((tool) => tool.name)).toEqual(['get_weather', 'get_time'])
  })

  it('stores the auto-execute flag without acting on it', async () => {
    const provider = new MockProvider([
      {content: '', finishReason: 'tool_calls', toolCalls: [{id: 'call_1', name: 'get_weather', arguments: {}}]}
    ])
    const builder = new LLM('mock:gpt', {provider}).withTools([weatherTool]).setAutoExecute(true)

    const response = await builder.complete(hello())

    expect(builder.isAutoExecute()).toBe(true)
    expect(response.hasToolCalls()).toBe(true)
    expect(provider.requests).toHaveLength(1)
  })
})

describe('client events', () => {
  it('publishes request_start and response for each exchange', async () => {
    const bus = new InMemoryEventBus<ClientEvent>()
    const events: ClientEvent[] = []
    bus.subscribe((event) => events.push(event))
    const provider = new MockProvider([{content: 'Hi', finishReason: 'stop', usage: {promptTokens: 2, outputTokens: 1}}])

    await new LLM('mock:echo', {provider, bus}).complete(hello())

    expect(events.map((event) => event.type)).toEqual(['request_start', 'response'])
    expect(events[0]).toMatchObject({provider: 'mock', model: 'echo', kind: 'plain', messageCount: 1, toolCount: 0})
    expect(events[1]).toMatchObject({
      kind: 'plain',
      finishReason: 'stop',
      toolCallCount: 0,
      usage: {prompt_tokens: 2, output_tokens: 1, total_tokens: 3}
    })
    expect(events[1]?.exchangeId).toBe(events[0]?.exchangeId)
  })

  it('publishes an error event when the exchange fails', async () => {
    const bus = new InMemoryEventBus<ClientEvent>()
    const events: ClientEvent[] = []
    bus.subscribe((event) => events.push(event))
    const provider = new MockProvider([{content: 'nope', finishReason: 'stop'}])

    await expect(new LLM('mock:echo', {provider, bus}).structured().complete(hello())).rejects.toThrow(
      StructuredOutputError
    )

    expect(events.map((event) => event.type)).toEqual(['request_start', 'error'])
    expect(events[1]).toMatchObject({kind: 'structured', code: 'STRUCTURED_OUTPUT_ERROR'})
  })

  it('keeps completing when a subscriber throws', async () => {
    const onHandlerError = vi.fn()
    const bus = new InMemoryEventBus<ClientEvent>({onHandlerError})
    bus.subscribe(() => {
      throw new Error('subscriber down')
    })

    const response = await new LLM('mock:echo', {provider: new MockProvider(), bus}).complete(hello())

    expect(response.content).toBe('Mock response: Hello')
    expect(onHandlerError).toHaveBeenCalledTimes(2)
  })
})

describe('provider factory', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('rejects malformed model ids and unknown vendors', () => {
    expect(() => new LLM('gpt-4o')).toThrow(ValidationError)
    expect(() => createProvider({provider: 'acme', model: 'x'})).toThrow(
      "Provider 'acme' is not supported. Use one of: mock, openai, openrouter"
    )
  })

  it('requires an api key for hosted vendors', () => {
    vi.stubEnv('OPENAI_API_KEY', '')
    expect(() => new LLM('openai:gpt-4o-mini')).toThrow(
      'OPENAI_API_KEY is missing. Set it in your environment or .env file.'
    )
  })

  it('resolves vendors by name', () => {
    vi.stubEnv('OPENROUTER_API_KEY', 'test-secret')
    expect(createProvider({provider: 'openrouter', model: 'meta/llama'}).name).toBe('openrouter')
    expect(createProvider({provider: 'openai', model: 'gpt'}, {apiKey: 'test-secret'}).name).toBe('openai')
    expect(new LLM('mock:anything').getProviderName()).toBe('mock')
  })
})
