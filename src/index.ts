export {runAgent, runAgentTask, providerFromConfig, DEFAULT_MAX_STEPS} from './core/agent.js'
export type {AgentEvent, AgentRunOptions, AgentTaskOptions} from './core/agent.js'
export {Conversation} from './core/conversation.js'
export type {ConversationState} from './core/conversation.js'
export {
  AgentError,
  InternalError,
  ServiceContractError,
  StartupError,
  StepLimitError,
  ToolExecutionError
} from './core/errors.js'
export type {AgentErrorKind, ServiceContractCode} from './core/errors.js'
export {InMemoryEventBus} from './core/event-bus.js'
export type {EventBus, EventHandler} from './core/event-bus.js'
export {loadConfig} from './config/load-config.js'
export {appConfigSchema, DEFAULT_BASE_URL, DEFAULT_MODEL} from './config/schema.js'
export type {AppConfig} from './config/schema.js'
export {OpenAIProvider} from './providers/openai-provider.js'
export type {ChatMessage, LLMProvider, ProviderResponse, ProviderToolCall, ProviderToolDefinition} from './providers/types.js'
export {bashTool, createDefaultToolRegistry, readTool, writeTool} from './tools/builtin.js'
export {ToolRegistry, decodeArguments} from './tools/registry.js'
export {defineTool} from './tools/types.js'
export type {ToolContext, ToolDefinition, ToolOutcome} from './tools/types.js'
