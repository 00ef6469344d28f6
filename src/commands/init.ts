import {Command, Flags} from '@oclif/core'
import {mkdir, writeFile} from 'node:fs/promises'
import {resolve} from 'node:path'
import {getTooltalkHome} from '../config/paths.js'
import {DEFAULT_MODEL} from '../config/schema.js'

export default class Init extends Command {
  static override description = 'Initialize local project config and global tooltalk home'

  static override flags = {
    force: Flags.boolean({char: 'f', description: 'overwrite existing config'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Init)
    const targetDir = process.cwd()
    const homeDir = getTooltalkHome()
    const configPath = resolve(targetDir, '.tooltalkrc.json')
    const globalEnvExamplePath = resolve(homeDir, '.env.example')
    const flag = flags.force ? 'w' : 'wx'

    await mkdir(homeDir, {recursive: true})
    await writeFile(
      configPath,
      JSON.stringify(
        {
          model: DEFAULT_MODEL,
          baseURL: '',
          request: {temperature: 0.7},
          runtime: {timeoutMs: 45_000, maxToolRounds: 8},
          logging: {exchanges: true}
        },
        null,
        2
      ) + '\n',
      {flag}
    )
    await writeFile(
      globalEnvExamplePath,
      'OPENAI_API_KEY=\nOPENAI_BASE_URL=\nOPENROUTER_API_KEY=\nTOOLTALK_MODEL=openai:gpt-4o-mini\n',
      {flag}
    )

    this.log(`Created ${configPath}`)
    this.log(`Created ${globalEnvExamplePath}`)
  }
}
