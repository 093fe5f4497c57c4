/**
 * Tool dispatch for one model response.
 *
 * Calls run sequentially in the order the model returned them, so an issue
 * is created (and its worker spawn attempted) before the next call runs.
 * Every call yields exactly one tool message; failures become `Error: ...`
 * results for the model to read.
 */

import { errorMessage } from '../../core/errors.js'
import type { ChatMessage, HookEmitter, Tool, ToolCall, ToolSpec } from '../../host/types.js'
import { parseCreatedIssue } from '../issue-store/issue-client.js'
import type { Issue } from '../issue-store/issue-schema.js'
import { createLogger } from '../../utils/logger.js'
import { emitHook } from './hooks.js'

const logger = createLogger('agent-loop')

export type ToolMessage = Extract<ChatMessage, { role: 'tool' }>

export interface ToolDispatchOptions {
  tools: Readonly<Record<string, Tool>>
  hooks: HookEmitter | null
  /** Name of the issue tool whose `create` results trigger a spawn */
  issueTool: string
  onIssueCreated: (issue: Issue) => Promise<unknown>
}

/** Describe the available tools to the model */
export function toToolSpecs(tools: Readonly<Record<string, Tool>>): ToolSpec[] {
  return Object.entries(tools).map(([name, tool]) => ({
    name,
    description: tool.description,
    parameters: tool.inputSchema,
  }))
}

/** Objects are sent to the model as JSON, everything else as its string form */
export function renderToolOutput(output: unknown): string {
  if (typeof output === 'string') return output
  if (typeof output === 'object' && output !== null) return JSON.stringify(output)
  return String(output)
}

function isCreateCall(call: ToolCall, issueTool: string): boolean {
  return call.name === issueTool && call.arguments.operation === 'create'
}

export async function dispatchToolCalls(
  calls: readonly ToolCall[],
  options: ToolDispatchOptions,
): Promise<ToolMessage[]> {
  const { tools, hooks, issueTool, onIssueCreated } = options
  const results: ToolMessage[] = []

  for (const call of calls) {
    const tool = tools[call.name]
    if (tool === undefined) {
      results.push({ role: 'tool', toolCallId: call.id, content: `Tool '${call.name}' not found` })
      continue
    }

    await emitHook(hooks, 'tool:pre', { tool_name: call.name, arguments: call.arguments })

    try {
      const { output } = await tool.execute(call.arguments)

      if (isCreateCall(call, issueTool)) {
        const issue = parseCreatedIssue(output)
        if (issue !== null) {
          await onIssueCreated(issue)
        } else {
          logger.warn({ tool: call.name }, 'Issue create returned no issue; no worker spawned')
        }
      }

      results.push({ role: 'tool', toolCallId: call.id, content: renderToolOutput(output) })
      await emitHook(hooks, 'tool:post', { tool_name: call.name, result: output })
    } catch (err) {
      const message = errorMessage(err)
      logger.warn({ tool: call.name, error: message }, 'Tool call failed')
      results.push({ role: 'tool', toolCallId: call.id, content: `Error: ${message}` })
      await emitHook(hooks, 'tool:post', { tool_name: call.name, error: message })
    }
  }

  return results
}
