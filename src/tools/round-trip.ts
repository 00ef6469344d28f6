import type {ToolBuilder} from '../core/builders.js'
import {errorMessage} from '../core/errors.js'
import type {JsonValue} from '../core/json.js'
import type {MessageCollection} from '../core/message.js'
import type {ToolResponse} from '../core/response.js'
import type {ToolCall} from '../core/tool.js'

export type ToolExecutor = (args: JsonValue) => string | Promise<string>

export type RoundTripEvent =
  | {type: 'model_response'; round: number; content: string; toolCalls: number}
  | {type: 'tool_call'; round: number; call: ToolCall}
  | {type: 'tool_result'; round: number; callId: string; output: string}

export type RoundTripResult = {
  response: ToolResponse
  rounds: number
  /** True when the round limit was hit while the model was still calling tools. */
  exhausted: boolean
}

type RoundTripOptions = {
  maxRounds: number
  onEvent?: (event: RoundTripEvent) => void
}

async function execute(executors: ReadonlyMap<string, ToolExecutor>, call: ToolCall): Promise<string> {
  const executor = executors.get(call.name)
  if (!executor) return `Error: no executor for tool '${call.name}'`
  try {
    return await executor(call.arguments)
  } catch (error) {
    return `Error: ${errorMessage(error)}`
  }
}

/**
 * Caller-side tool loop: replays each tool-calling response, runs every call in order,
 * appends the results and asks again, for at most `maxRounds` completions.
 */
export async function runToolRounds(
  builder: ToolBuilder,
  messages: MessageCollection,
  executors: ReadonlyMap<string, ToolExecutor>,
  options: RoundTripOptions
): Promise<RoundTripResult> {
  if (!Number.isInteger(options.maxRounds) || options.maxRounds < 1) {
    throw new RangeError(`maxRounds must be a positive integer, got ${options.maxRounds}`)
  }

  let response: ToolResponse | undefined
  for (let round = 0; round < options.maxRounds; round += 1) {
    response = await builder.complete(messages)
    options.onEvent?.({
      type: 'model_response',
      round,
      content: response.content,
      toolCalls: response.toolCalls.length
    })
    if (!response.hasToolCalls()) return {response, rounds: round + 1, exhausted: false}

    messages.fromResponse(response)
    for (const call of response.toolCalls) {
      options.onEvent?.({type: 'tool_call', round, call})
      const output = await execute(executors, call)
      messages.appendToolResult(call.id, output)
      options.onEvent?.({type: 'tool_result', round, callId: call.id, output})
    }
  }

  if (!response) throw new RangeError('maxRounds must be at least 1')
  return {response, rounds: options.maxRounds, exhausted: true}
}
