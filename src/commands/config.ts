import {Command} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {redactConfig, type AppConfig} from '../config/schema.js'
import {errorMessage} from '../core/errors.js'

export default class Config extends Command {
  static override description = 'Print resolved config (API key redacted)'

  public async run(): Promise<void> {
    let config: AppConfig
    try {
      config = await loadConfig()
    } catch (error) {
      this.error(errorMessage(error), {exit: 1})
    }

    this.log(JSON.stringify(redactConfig(config), null, 2))
  }
}
