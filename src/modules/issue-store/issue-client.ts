/**
 * Typed wrapper over the host's issue tool.
 *
 * The tool speaks `{ operation, params }` and answers `{ output }`. The
 * operation names and parameter keys used here are a wire contract shared
 * with workers, which update the same issues through the same tool.
 */

import { IssueStoreError } from '../../core/errors.js'
import type { IssueId, IssueStatus } from '../../core/types.js'
import type { Tool } from '../../host/types.js'
import { createLogger } from '../../utils/logger.js'
import {
  IssueCreatedOutputSchema,
  IssueListOutputSchema,
  IssueSchema,
  type Issue,
} from './issue-schema.js'

const logger = createLogger('issue-store')

export interface IssueUpdate {
  status: IssueStatus
  block_reason?: string
}

/** Read access to the issue store, as needed by recovery and reporting */
export interface IssueReader {
  listByStatus(status: IssueStatus): Promise<Issue[]>
}

/** Read and write access to the issue store */
export interface IssueStore extends IssueReader {
  update(issueId: IssueId, fields: IssueUpdate): Promise<void>
}

function parseIssues(raw: readonly unknown[], status: IssueStatus): Issue[] {
  const issues: Issue[] = []
  for (const entry of raw) {
    const parsed = IssueSchema.safeParse(entry)
    if (parsed.success) {
      issues.push(parsed.data)
    } else {
      logger.warn({ status, issues: parsed.error.issues }, 'Skipping malformed issue in list output')
    }
  }
  return issues
}

export class IssueClient implements IssueStore {
  constructor(private readonly _tool: Tool) {}

  /**
   * List issues with the given status.
   *
   * @throws {IssueStoreError} when the tool output carries no issue list
   */
  async listByStatus(status: IssueStatus): Promise<Issue[]> {
    const result = await this._tool.execute({ operation: 'list', params: { status } })
    const parsed = IssueListOutputSchema.safeParse(result.output)
    if (!parsed.success) {
      throw new IssueStoreError(`Issue tool returned no issue list for status "${status}"`, {
        status,
      })
    }
    return parseIssues(parsed.data.issues, status)
  }

  async update(issueId: IssueId, fields: IssueUpdate): Promise<void> {
    const params: Record<string, unknown> = { issue_id: issueId, status: fields.status }
    if (fields.block_reason !== undefined) {
      params.block_reason = fields.block_reason
    }
    await this._tool.execute({ operation: 'update', params })
  }
}

/**
 * Extract the issue from a `create` operation's output, or `null` when the
 * output does not describe a created issue.
 */
export function parseCreatedIssue(output: unknown): Issue | null {
  const envelope = IssueCreatedOutputSchema.safeParse(output)
  if (!envelope.success) return null
  const issue = IssueSchema.safeParse(envelope.data.issue)
  return issue.success ? issue.data : null
}

/** The routing type of an issue: `issue_type`, then `metadata.type`, then "general" */
export function issueTypeOf(issue: Issue): string {
  if (typeof issue.issue_type === 'string' && issue.issue_type !== '') {
    return issue.issue_type
  }
  const metaType = issue.metadata?.type
  if (typeof metaType === 'string' && metaType !== '') {
    return metaType
  }
  return 'general'
}
