import {Args, Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {MessageCollection} from '../core/message.js'
import type {Response} from '../core/response.js'
import {openRuntime} from '../core/runtime.js'

/** Parses a decimal number; range checks stay with the request config. */
export async function parseNumberFlag(input: string): Promise<number> {
  const trimmed = input.trim()
  const value = Number(trimmed)
  if (!trimmed || !Number.isFinite(value)) {
    throw new Error(`Expected a number but received '${input}'`)
  }
  return value
}

const numberFlag = Flags.custom<number>({parse: parseNumberFlag})

export default class Complete extends Command {
  static override description = 'Send one prompt and print the reply'

  static override examples = [
    '<%= config.bin %> <%= command.id %> "Say hi"',
    `<%= config.bin %> <%= command.id %> "Describe Ada Lovelace" --schema '{"type":"object"}' --json`
  ]

  static override flags = {
    system: Flags.string({char: 's', description: 'system prompt sent before the user prompt'}),
    model: Flags.string({char: 'm', description: 'model id as provider:model (overrides config)'}),
    temperature: numberFlag({description: 'sampling temperature, 0 to 2'}),
    maxTokens: Flags.integer({description: 'maximum output tokens'}),
    schema: Flags.string({description: 'JSON schema text; requests structured output'}),
    json: Flags.boolean({description: 'print the full response record as JSON'})
  }

  static override args = {
    prompt: Args.string({description: 'user prompt', required: true})
  }

  public async run(): Promise<void> {
    const {args, flags} = await this.parse(Complete)
    const config = await loadConfig()
    const runtime = openRuntime(config, {model: flags.model})

    const messages = new MessageCollection()
    if (flags.system) messages.appendSystem(flags.system)
    messages.appendUser(args.prompt)

    let response: Response
    try {
      const builder = flags.schema === undefined ? runtime.llm : runtime.llm.structured(flags.schema)
      if (flags.temperature !== undefined) builder.setTemperature(flags.temperature)
      if (flags.maxTokens !== undefined) builder.setMaxTokens(flags.maxTokens)
      response = await builder.complete(messages)
    } finally {
      await runtime.close()
    }

    if (flags.json) {
      this.log(JSON.stringify(response.toRecord(), null, 2))
      return
    }

    this.log(response.content)
    const usage = response.usage
    this.logToStderr(
      `[${response.model}] finish=${response.finishReason} tokens=${usage.getPromptTokens()}+${usage.getOutputTokens()}=${usage.getTotalTokens()}`
    )
  }
}
