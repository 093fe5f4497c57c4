/**
 * System prompt and message assembly for the foreman's model turns.
 */

import type { ChatMessage, HistoryMessage } from '../../host/types.js'

export function foremanSystemPrompt(issueTool: string): string {
  return `You are the FOREMAN: you coordinate work and hand it to specialised workers. You never do the work yourself.

## YOUR ROLE

1. Split each request into discrete issues with the \`${issueTool}\` tool
2. Leave implementation to the workers, which are dispatched automatically for every new issue
3. Relay worker progress to the user
4. Collect clarifications when a worker is waiting on the user

## WORKFLOW

### The user asks for work (build, create, implement, fix, ...)
1. Acknowledge the request in a sentence
2. Call \`${issueTool}\` with operation "create" once per task
3. Tell the user which issues were created

### The user asks for status
1. Call \`${issueTool}\` with operation "list"
2. Summarise what is in progress, completed and blocked

### The user answers a question from a worker
1. Call \`${issueTool}\` with operation "update" to record the answer on the issue

## RULES

- Do not call shell, file or editing tools to carry out a work request
- Every piece of work becomes an issue
- Keep replies short; the workers do the heavy lifting
- Mark status with emojis: 📋 new work, ✅ completed, ⏳ in progress, ⚠️ blocked

## ISSUE TYPES

Set \`issue_type\` to one of: \`task\`, \`feature\`, \`bug\`, \`epic\`, \`chore\`.
- \`task\` for implementation work
- \`feature\` for new functionality
- \`bug\` for fixes
- \`epic\` for a group of related issues
- \`chore\` for maintenance and setup`
}

/** Append the progress digest to the system prompt when there is one */
export function buildSystemContent(issueTool: string, digest: string): string {
  const base = foremanSystemPrompt(issueTool)
  return digest === '' ? base : `${base}\n\n## CURRENT WORKER STATUS\n${digest}`
}

/**
 * Build the model-facing message list: system prompt, the last `historyTurns`
 * history entries that are user or assistant messages, then the prompt.
 */
export function buildMessages(options: {
  issueTool: string
  digest: string
  history: readonly HistoryMessage[]
  historyTurns: number
  prompt: string
}): ChatMessage[] {
  const { issueTool, digest, history, historyTurns, prompt } = options
  const messages: ChatMessage[] = [{ role: 'system', content: buildSystemContent(issueTool, digest) }]

  const recent = historyTurns === 0 ? [] : history.slice(-historyTurns)
  for (const entry of recent) {
    if (entry.role === 'user' || entry.role === 'assistant') {
      messages.push({ role: entry.role, content: entry.content })
    }
  }

  messages.push({ role: 'user', content: prompt })
  return messages
}
