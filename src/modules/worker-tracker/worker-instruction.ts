/**
 * Worker instruction: the self-contained prompt a worker session receives.
 *
 * Workers claim their own issue. The foreman never sets `in_progress` on a
 * worker's behalf, so the store attributes the claim to the session doing
 * the work.
 */

import type { Issue } from '../issue-store/issue-schema.js'

export function buildWorkerInstruction(issue: Issue, issueTool: string): string {
  const description = issue.description.trim() !== '' ? issue.description : 'No description provided.'

  return `You are a worker assigned to a single issue.

## Issue #${issue.id}: ${issue.title}

${description}

## Instructions

1. Claim the issue FIRST, before any other action: call the \`${issueTool}\` tool with
   operation "update" and params { "issue_id": "${issue.id}", "status": "in_progress" }.
2. Do the work the issue describes.
3. When you stop, call \`${issueTool}\` with operation "update" and set "status" to exactly one of:
   - "completed": attach a summary of what you did
   - "blocked": attach what prevented you from finishing
   - "pending_user_input": attach the question the user needs to answer

Leave the issue in one of those three statuses on every exit path.
`
}
