import {Command, Flags} from '@oclif/core'
import {existsSync} from 'node:fs'
import process from 'node:process'
import {loadConfig} from '../config/load-config.js'
import {getGlobalEnvPath, getLocalEnvPath, getToolloopHome} from '../config/paths.js'
import {redactConfig, type AppConfig} from '../config/schema.js'
import {errorMessage} from '../core/errors.js'
import {createDefaultToolRegistry} from '../tools/builtin.js'

type DoctorReport = {
  cliVersion: string
  nodeVersion: string
  platform: string
  cwd: string
  shell: string
  toolloopHome: string
  globalEnvPath: string
  globalEnvExists: boolean
  localEnvPath: string
  localEnvExists: boolean
  env: {
    hasOpenRouterKey: boolean
    hasOpenRouterBaseURL: boolean
    hasModelOverride: boolean
  }
  tools: string[]
  config?: AppConfig
  configError?: string
}

export default class Doctor extends Command {
  static override description = 'Print runtime diagnostics for config and environment'

  static override flags = {
    json: Flags.boolean({description: 'print JSON output'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Doctor)

    const localEnvPath = getLocalEnvPath()
    const report: DoctorReport = {
      cliVersion: this.config.pjson.version,
      nodeVersion: process.version,
      platform: `${process.platform}-${process.arch}`,
      cwd: process.cwd(),
      shell: process.env.SHELL?.trim() || '(platform default)',
      toolloopHome: getToolloopHome(),
      globalEnvPath: getGlobalEnvPath(),
      globalEnvExists: existsSync(getGlobalEnvPath()),
      localEnvPath,
      localEnvExists: existsSync(localEnvPath),
      env: {
        hasOpenRouterKey: Boolean(process.env.OPENROUTER_API_KEY),
        hasOpenRouterBaseURL: Boolean(process.env.OPENROUTER_BASE_URL),
        hasModelOverride: Boolean(process.env.TOOLLOOP_MODEL)
      },
      tools: createDefaultToolRegistry().names()
    }

    try {
      report.config = redactConfig(await loadConfig())
    } catch (error) {
      report.configError = errorMessage(error)
    }

    if (flags.json) {
      this.log(JSON.stringify(report, null, 2))
      return
    }

    this.log(`toolloop version: ${report.cliVersion}`)
    this.log(`node: ${report.nodeVersion}`)
    this.log(`platform: ${report.platform}`)
    this.log(`cwd: ${report.cwd}`)
    this.log(`shell: ${report.shell}`)
    this.log(`toolloop home: ${report.toolloopHome}`)
    this.log(`global env: ${report.globalEnvPath} (exists=${report.globalEnvExists})`)
    this.log(`local env: ${report.localEnvPath} (exists=${report.localEnvExists})`)
    this.log(
      `env flags: OPENROUTER_API_KEY=${report.env.hasOpenRouterKey} OPENROUTER_BASE_URL=${report.env.hasOpenRouterBaseURL} TOOLLOOP_MODEL=${report.env.hasModelOverride}`
    )
    this.log(`tools: ${report.tools.join(', ')}`)
    if (report.configError) {
      this.log(`config error: ${report.configError}`)
      return
    }
    this.log('resolved config:')
    this.log(JSON.stringify(report.config, null, 2))
  }
}
