import {Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import type {AppConfig} from '../config/schema.js'
import {runAgentTask, type AgentEvent} from '../core/agent.js'
import {errorMessage} from '../core/errors.js'
import {InMemoryEventBus} from '../core/event-bus.js'
import {LogSubscriber} from '../core/subscribers/log-subscriber.js'
import {MetricsSubscriber, formatMetrics} from '../core/subscribers/metrics-subscriber.js'

export default class Run extends Command {
  static override description = 'Run a one-shot prompt, letting the model call Read, Write and Bash'

  static override examples = [
    '<%= config.bin %> <%= command.id %> -p "Summarize README.md"',
    '<%= config.bin %> <%= command.id %> -p "Run the tests and fix failures" --max-steps 20'
  ]

  static override flags = {
    prompt: Flags.string({char: 'p', description: 'prompt sent to the model', required: true}),
    quiet: Flags.boolean({description: 'hide diagnostic logs on stderr'}),
    verboseModel: Flags.boolean({description: 'log raw model text for each step'}),
    debug: Flags.boolean({description: 'log timings, model requests and a metrics summary'}),
    'max-steps': Flags.integer({description: 'maximum model round-trips before giving up', min: 1})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Run)

    let config: AppConfig
    try {
      config = await loadConfig()
    } catch (error) {
      this.error(errorMessage(error), {exit: 1})
    }

    const bus = new InMemoryEventBus<AgentEvent>((error, event) => {
      this.logToStderr(`[subscriber error] event=${event.type} ${errorMessage(error)}`)
    })
    const metrics = new MetricsSubscriber()
    const unsubscribeMetrics = bus.subscribe((event) => metrics.handle(event))
    const logger = new LogSubscriber((line) => this.logToStderr(line), {
      debug: flags.debug,
      verboseModel: flags.verboseModel
    })
    const unsubscribeLog = flags.quiet ? () => {} : bus.subscribe((event) => logger.handle(event))

    let output: string
    try {
      output = await runAgentTask(flags.prompt, {config, bus, maxSteps: flags['max-steps']})
    } catch (error) {
      this.error(errorMessage(error), {exit: 1})
    } finally {
      unsubscribeLog()
      unsubscribeMetrics()
      if (flags.debug) this.logToStderr(formatMetrics(metrics.snapshot()))
    }

    // The answer is written verbatim: no trailing newline is added.
    process.stdout.write(output)
  }
}
