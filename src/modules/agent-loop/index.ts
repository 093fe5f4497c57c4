export {
  AgentLoopDriver,
  NO_PROVIDER_RESPONSE,
  extractText,
  type AgentLoopDriverOptions,
  type ForemanTurn,
  type TurnStatus,
} from './agent-loop-driver.js'
export { emitHook } from './hooks.js'
export { buildMessages, buildSystemContent, foremanSystemPrompt } from './system-prompt.js'
export {
  dispatchToolCalls,
  renderToolOutput,
  toToolSpecs,
  type ToolDispatchOptions,
  type ToolMessage,
} from './tool-dispatcher.js'
