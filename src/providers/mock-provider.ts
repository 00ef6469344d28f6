import type {LLMProvider, ProviderReply, ProviderRequest} from './types.js'

/**
 * In-process provider that replays scripted replies in order. Once the script runs
 * out it echoes the last message. Every request is recorded for inspection.
 */
export class MockProvider implements LLMProvider {
  readonly name = 'mock'
  readonly requests: ProviderRequest[] = []
  private readonly script: Array<ProviderReply | Error>

  constructor(script: Array<ProviderReply | Error> = []) {
    this.script = [...script]
  }

  enqueue(reply: ProviderReply | Error): this {
    this.script.push(reply)
    return this
  }

  get remaining(): number {
    return this.script.length
  }

  async completeChat(request: ProviderRequest): Promise<ProviderReply> {
    this.requests.push(request)
    const next = this.script.shift()
    if (next instanceof Error) throw next
    if (next) return next

    const last = request.messages.at(-1)
    if (!last) return {content: 'No input provided.', finishReason: 'stop'}
    return {content: `Mock response: ${last.content}`, finishReason: 'stop'}
  }
}
