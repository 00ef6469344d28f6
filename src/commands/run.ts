import {Args, Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {MessageCollection} from '../core/message.js'
import {openRuntime} from '../core/runtime.js'
import {currentTimeTool, runCurrentTimeTool} from '../tools/clock.js'
import {runToolRounds, type RoundTripEvent, type ToolExecutor} from '../tools/round-trip.js'

function now(): string {
  return new Date().toISOString()
}

function shorten(text: string, max = 500): string {
  if (text.length <= max) return text
  return `${text.slice(0, max)}\n...[truncated]`
}

function eventLine(event: RoundTripEvent): string {
  switch (event.type) {
    case 'model_response':
      return `[${now()}] MODEL_RESPONSE round=${event.round} tool_calls=${event.toolCalls}\n${shorten(event.content)}`
    case 'tool_call':
      return `[${now()}] TOOL_CALL round=${event.round} tool=${event.call.name} id=${event.call.id} input=${JSON.stringify(event.call.arguments)}`
    case 'tool_result':
      return `[${now()}] TOOL_RESULT round=${event.round} id=${event.callId}\n${shorten(event.output)}`
  }
}

const EXECUTORS = new Map<string, ToolExecutor>([[currentTimeTool.name, (args) => runCurrentTimeTool(args)]])

export default class Run extends Command {
  static override description = 'Run a prompt with the built-in tools until the model answers'

  static override flags = {
    system: Flags.string({char: 's', description: 'system prompt sent before the user prompt'}),
    model: Flags.string({char: 'm', description: 'model id as provider:model (overrides config)'}),
    maxRounds: Flags.integer({description: 'maximum completions before giving up (overrides config)'}),
    quiet: Flags.boolean({description: 'hide round logs and print only the final output'})
  }

  static override args = {
    prompt: Args.string({description: 'user prompt', required: true})
  }

  public async run(): Promise<void> {
    const {args, flags} = await this.parse(Run)
    const config = await loadConfig()
    const runtime = openRuntime(config, {model: flags.model})

    const messages = new MessageCollection()
    if (flags.system) messages.appendSystem(flags.system)
    messages.appendUser(args.prompt)

    try {
      const result = await runToolRounds(runtime.llm.withTools([currentTimeTool]), messages, EXECUTORS, {
        maxRounds: flags.maxRounds ?? config.runtime.maxToolRounds,
        onEvent: flags.quiet ? undefined : (event) => this.log(eventLine(event))
      })
      if (result.exhausted) {
        this.warn(`Stopped after ${result.rounds} rounds with tool calls still pending`)
      }
      this.log(result.response.content)
    } finally {
      await runtime.close()
    }

    if (!flags.quiet) {
      const total = runtime.usage.total()
      this.log(
        `[${now()}] USAGE session=${runtime.sessionId} prompt=${total.getPromptTokens()} output=${total.getOutputTokens()} total=${total.getTotalTokens()}`
      )
    }
  }
}
