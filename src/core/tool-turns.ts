import {ToolCallError} from './errors.js'
import type {Message} from './message.js'

/**
 * Checks that every tool result answers, in order, the next outstanding call of the
 * most recent assistant replay, and that no replay is left with unanswered calls.
 * Providers reject conversations that break this, so it is checked before sending.
 */
export function assertToolTurns(messages: readonly Message[]): void {
  let outstanding: string[] = []

  messages.forEach((message, index) => {
    if (message.role === 'tool') {
      const expected = outstanding[0]
      if (expected === undefined) {
        throw new ToolCallError(
          `Tool result at index ${index} for call '${message.toolCallId}' is not preceded by an assistant replay of that call`,
          message.toolCallId
        )
      }
      if (message.toolCallId !== expected) {
        throw new ToolCallError(
          `Tool result at index ${index} answers call '${message.toolCallId}' but call '${expected}' is next`,
          message.toolCallId
        )
      }
      outstanding = outstanding.slice(1)
      return
    }

    if (outstanding.length > 0) {
      throw new ToolCallError(
        `Message at index ${index} follows unanswered tool call(s): ${outstanding.join(', ')}`,
        outstanding[0]
      )
    }

    if (message.role === 'assistant' && message.toolCalls?.length) {
      outstanding = message.toolCalls.map((call) => call.id)
    }
  })

  if (outstanding.length > 0) {
    throw new ToolCallError(`Conversation ends with unanswered tool call(s): ${outstanding.join(', ')}`, outstanding[0])
  }
}
