/**
 * AgentLoopDriver: runs one conversational turn of the foreman.
 *
 * Turn sequence:
 *  1. pick the model provider (none → fixed reply)
 *  2. prompt:submit hook; a denial ends the turn
 *  3. execution:start, history snapshot, prompt appended to the context
 *  4. reap finished workers, run the one-time orphan scan, build the digest
 *  5. model/tool loop bounded by max_iterations; issue creation spawns workers
 *  6. response persisted, orchestrator:complete and execution:end emitted
 *
 * Workers launched during the turn keep running after execute() returns.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { errorMessage } from '../../core/errors.js'
import { resolveCapabilities, type HostCoordinator } from '../../host/capabilities.js'
import type {
  ChatMessage,
  ChatResponse,
  ConversationContext,
  HistoryMessage,
  HookEmitter,
  ModelProvider,
  Tool,
} from '../../host/types.js'
import type { ForemanConfig } from '../config/config-schema.js'
import { IssueClient } from '../issue-store/issue-client.js'
import type { OrphanScanner } from '../../recovery/orphan-scanner.js'
import type { ProgressReporter } from '../progress/progress-reporter.js'
import type { WorkerSpawnContext, WorkerTaskTracker } from '../worker-tracker/worker-task-tracker.js'
import { createLogger } from '../../utils/logger.js'
import { emitHook } from './hooks.js'
import { buildMessages } from './system-prompt.js'
import { dispatchToolCalls, toToolSpecs } from './tool-dispatcher.js'

const logger = createLogger('agent-loop')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Everything the host hands the foreman for one turn */
export interface ForemanTurn {
  context: ConversationContext
  providers: Readonly<Record<string, ModelProvider>>
  tools: Readonly<Record<string, Tool>>
  hooks?: HookEmitter | null
  coordinator?: HostCoordinator | null
}

export type TurnStatus = 'success' | 'incomplete'

export interface AgentLoopDriverOptions {
  config: Pick<ForemanConfig, 'max_iterations' | 'history_turns' | 'issue_tool'>
  tracker: Pick<WorkerTaskTracker, 'maybeSpawnWorker' | 'reap'>
  scanner: Pick<OrphanScanner, 'maybeRecoverOrphanedIssues'>
  reporter: Pick<ProgressReporter, 'checkWorkerProgress'>
  eventBus: TypedEventBus
}

export const NO_PROVIDER_RESPONSE = 'No LLM provider available.'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Text of a model response: the string itself, or its text blocks joined by newlines */
export function extractText(content: ChatResponse['content']): string {
  if (content === null) return ''
  if (typeof content === 'string') return content
  const parts: string[] = []
  for (const block of content) {
    if (block.type === 'text' && block.text !== undefined) {
      parts.push(block.text)
    }
  }
  return parts.join('\n')
}

function firstProvider(providers: Readonly<Record<string, ModelProvider>>): ModelProvider | null {
  const [provider] = Object.values(providers)
  return provider ?? null
}

// ---------------------------------------------------------------------------
// AgentLoopDriver
// ---------------------------------------------------------------------------

export class AgentLoopDriver {
  private readonly _config: AgentLoopDriverOptions['config']
  private readonly _tracker: AgentLoopDriverOptions['tracker']
  private readonly _scanner: AgentLoopDriverOptions['scanner']
  private readonly _reporter: AgentLoopDriverOptions['reporter']
  private readonly _eventBus: TypedEventBus

  constructor(options: AgentLoopDriverOptions) {
    this._config = options.config
    this._tracker = options.tracker
    this._scanner = options.scanner
    this._reporter = options.reporter
    this._eventBus = options.eventBus
  }

  async execute(prompt: string, turn: ForemanTurn): Promise<string> {
    const hooks = turn.hooks ?? null
    const coordinator = turn.coordinator ?? null

    const provider = firstProvider(turn.providers)
    if (provider === null) {
      return NO_PROVIDER_RESPONSE
    }

    const verdict = await emitHook(hooks, 'prompt:submit', { prompt })
    if (verdict?.action === 'deny') {
      logger.info({ reason: verdict.reason }, 'Prompt denied by host policy')
      return `Operation denied: ${verdict.reason ?? 'no reason given'}`
    }

    await emitHook(hooks, 'execution:start', { prompt })
    try {
      return await this._runTurn(prompt, provider, turn, hooks, coordinator)
    } finally {
      await emitHook(hooks, 'execution:end', { prompt })
    }
  }

  private async _runTurn(
    prompt: string,
    provider: ModelProvider,
    turn: ForemanTurn,
    hooks: HookEmitter | null,
    coordinator: HostCoordinator | null,
  ): Promise<string> {
    const { context, tools } = turn
    const issueToolName = this._config.issue_tool

    const history = await this._readHistory(context)
    await this._remember(context, { role: 'user', content: prompt })

    const issueTool = tools[issueToolName]
    const issues = issueTool !== undefined ? new IssueClient(issueTool) : null

    this._tracker.reap()
    if (issues !== null && coordinator !== null) {
      await this._scanner.maybeRecoverOrphanedIssues(issues)
    }
    const digest = await this._reporter.checkWorkerProgress(issues)

    const messages: ChatMessage[] = buildMessages({
      issueTool: issueToolName,
      digest,
      history,
      historyTurns: this._config.history_turns,
      prompt,
    })
    const toolSpecs = toToolSpecs(tools)
    const spawnContext: WorkerSpawnContext | null =
      issues === null
        ? null
        : { session: coordinator?.session ?? null, capabilities: resolveCapabilities(coordinator), issues }

    let finalResponse = ''
    let iterations = 0
    let status: TurnStatus = 'incomplete'

    while (iterations < this._config.max_iterations) {
      iterations++

      let response: ChatResponse
      try {
        response = await provider.complete({ messages, tools: toolSpecs })
      } catch (err) {
        const message = errorMessage(err)
        logger.error({ iteration: iterations, error: message }, 'Model call failed')
        return `Error communicating with LLM: ${message}`
      }

      const text = extractText(response.content)
      if (text !== '') {
        finalResponse = text
      }

      const toolCalls = response.toolCalls ?? []
      if (toolCalls.length === 0) {
        status = 'success'
        break
      }

      messages.push({ role: 'assistant', content: text, toolCalls })
      const results = await dispatchToolCalls(toolCalls, {
        tools,
        hooks,
        issueTool: issueToolName,
        onIssueCreated: async (issue) => {
          if (spawnContext !== null) {
            await this._tracker.maybeSpawnWorker(issue, spawnContext)
          }
        },
      })
      messages.push(...results)
    }

    if (status === 'incomplete') {
      logger.warn({ iterations }, 'Turn stopped at the iteration limit')
    }

    await this._remember(context, { role: 'assistant', content: finalResponse })
    await emitHook(hooks, 'orchestrator:complete', { turnCount: iterations, status })
    this._eventBus.emit('turn:complete', { iterations, status })
    return finalResponse
  }

  private async _readHistory(context: ConversationContext): Promise<HistoryMessage[]> {
    try {
      return await context.getMessages()
    } catch (err) {
      logger.warn({ error: errorMessage(err) }, 'Could not read conversation history')
      return []
    }
  }

  private async _remember(context: ConversationContext, message: HistoryMessage): Promise<void> {
    try {
      await context.addMessage(message)
    } catch (err) {
      logger.warn({ role: message.role, error: errorMessage(err) }, 'Could not persist conversation message')
    }
  }
}
