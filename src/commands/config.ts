import {Args, Command} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import type {AppConfig} from '../config/schema.js'
import {isJsonObject} from '../core/json.js'

/** Reads a dotted path such as `runtime.maxToolRounds` out of the resolved config. */
export function pickSetting(config: AppConfig, path: string): unknown {
  let current: unknown = config
  for (const key of path.split('.')) {
    if (typeof current !== 'object' || current === null || Array.isArray(current)) return undefined
    current = Object.entries(current).find(([name]) => name === key)?.[1]
  }
  return current
}

export default class Config extends Command {
  static override description =
    'Print resolved tooltalk config: model, request defaults, runtime limits and exchange logging'

  static override examples = ['<%= config.bin %> <%= command.id %>', '<%= config.bin %> <%= command.id %> runtime.maxToolRounds']

  static override args = {
    key: Args.string({description: 'dotted setting path, e.g. runtime.timeoutMs'})
  }

  public async run(): Promise<void> {
    const {args} = await this.parse(Config)
    const config = await loadConfig()
    if (!args.key) {
      this.log(JSON.stringify(config, null, 2))
      return
    }

    const value = pickSetting(config, args.key)
    if (value === undefined) this.error(`Unknown setting '${args.key}'`, {exit: 2})
    this.log(isJsonObject(value) ? JSON.stringify(value, null, 2) : String(value))
  }
}
