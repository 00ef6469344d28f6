import {Command, Flags} from '@oclif/core'
import {existsSync} from 'node:fs'
import process from 'node:process'
import {loadConfig} from '../config/load-config.js'
import {getGlobalEnvPath, getLogsDir, getTooltalkHome} from '../config/paths.js'
import {parseModelId} from '../core/model-id.js'
import {SUPPORTED_PROVIDERS} from '../providers/factory.js'

type DoctorReport = {
  cliVersion: string
  nodeVersion: string
  platform: string
  cwd: string
  tooltalkHome: string
  globalEnvPath: string
  globalEnvExists: boolean
  localEnvPath: string
  localEnvExists: boolean
  logsDir: string
  provider: string
  providerSupported: boolean
  env: {
    hasOpenAIKey: boolean
    hasOpenRouterKey: boolean
    hasTooltalkModel: boolean
    hasOpenAIBaseURL: boolean
  }
  config: unknown
}

export default class Doctor extends Command {
  static override description = 'Print runtime diagnostics for config and environment'

  static override flags = {
    json: Flags.boolean({description: 'print JSON output'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Doctor)

    const config = await loadConfig()
    const provider = parseModelId(config.model).provider
    const localEnvPath = `${process.cwd()}/.env`
    const report: DoctorReport = {
      cliVersion: this.config.pjson.version,
      nodeVersion: process.version,
      platform: `${process.platform}-${process.arch}`,
      cwd: process.cwd(),
      tooltalkHome: getTooltalkHome(),
      globalEnvPath: getGlobalEnvPath(),
      globalEnvExists: existsSync(getGlobalEnvPath()),
      localEnvPath,
      localEnvExists: existsSync(localEnvPath),
      logsDir: getLogsDir(config.homeDir),
      provider,
      providerSupported: SUPPORTED_PROVIDERS.includes(provider),
      env: {
        hasOpenAIKey: Boolean(process.env.OPENAI_API_KEY),
        hasOpenRouterKey: Boolean(process.env.OPENROUTER_API_KEY),
        hasTooltalkModel: Boolean(process.env.TOOLTALK_MODEL),
        hasOpenAIBaseURL: Boolean(process.env.OPENAI_BASE_URL)
      },
      config
    }

    if (flags.json) {
      this.log(JSON.stringify(report, null, 2))
      return
    }

    this.log(`tooltalk version: ${report.cliVersion}`)
    this.log(`node: ${report.nodeVersion}`)
    this.log(`platform: ${report.platform}`)
    this.log(`cwd: ${report.cwd}`)
    this.log(`tooltalk home: ${report.tooltalkHome}`)
    this.log(`global env: ${report.globalEnvPath} (exists=${report.globalEnvExists})`)
    this.log(`local env: ${report.localEnvPath} (exists=${report.localEnvExists})`)
    this.log(`exchange logs: ${report.logsDir}`)
    this.log(`provider: ${report.provider} (supported=${report.providerSupported})`)
    this.log(
      `env flags: OPENAI_API_KEY=${report.env.hasOpenAIKey} OPENROUTER_API_KEY=${report.env.hasOpenRouterKey} TOOLTALK_MODEL=${report.env.hasTooltalkModel} OPENAI_BASE_URL=${report.env.hasOpenAIBaseURL}`
    )
    this.log('resolved config:')
    this.log(JSON.stringify(report.config, null, 2))
  }
}
