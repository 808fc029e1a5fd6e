export type AgentErrorKind = 'startup' | 'service_contract' | 'tool_execution' | 'step_limit' | 'internal'

export type ServiceContractCode =
  | 'no_choices'
  | 'unknown_tool'
  | 'malformed_arguments'
  | 'missing_argument'
  | 'invalid_argument'
  | 'duplicate_tool_call_id'
  | 'unsupported_tool_call'

/** Base class for every failure that ends an agent run. */
export class AgentError extends Error {
  readonly kind: AgentErrorKind

  constructor(kind: AgentErrorKind, message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = new.target.name
    this.kind = kind
  }
}

export class StartupError extends AgentError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('startup', message, options)
  }
}

/** The completion service broke the tool contract it was given. */
export class ServiceContractError extends AgentError {
  readonly code: ServiceContractCode

  constructor(code: ServiceContractCode, message: string, options?: {cause?: unknown}) {
    super('service_contract', message, options)
    this.code = code
  }
}

export class ToolExecutionError extends AgentError {
  readonly tool: string

  constructor(tool: string, message: string, options?: {cause?: unknown}) {
    super('tool_execution', message, options)
    this.tool = tool
  }
}

export class StepLimitError extends AgentError {
  readonly maxSteps: number

  constructor(maxSteps: number) {
    super('step_limit', `Stopped after ${maxSteps} model round-trips without a final answer.`)
    this.maxSteps = maxSteps
  }
}

/** The loop broke its own transcript bookkeeping. Unreachable through `runAgent`. */
export class InternalError extends AgentError {
  constructor(message: string) {
    super('internal', message)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
