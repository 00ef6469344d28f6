import type {ErrorCode} from './errors.js'
import type {UsageRecord} from './usage.js'

export type CompletionKind = 'plain' | 'structured' | 'tool'

export type ClientEvent =
  | {
      type: 'request_start'
      exchangeId: string
      provider: string
      model: string
      kind: CompletionKind
      messageCount: number
      toolCount: number
    }
  | {
      type: 'response'
      exchangeId: string
      provider: string
      model: string
      kind: CompletionKind
      finishReason: string
      toolCallCount: number
      usage: UsageRecord
      durationMs: number
    }
  | {
      type: 'error'
      exchangeId: string
      provider: string
      model: string
      kind: CompletionKind
      code: ErrorCode
      message: string
      durationMs: number
    }

export type ClientEventType = ClientEvent['type']
