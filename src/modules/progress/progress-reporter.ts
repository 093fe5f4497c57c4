/**
 * ProgressReporter: folds worker and issue-store state into the digest that
 * is injected into the model's system prompt each turn.
 *
 * Sections, in fixed order, each omitted when empty:
 *  1. orphans found by the recovery scan (drained)
 *  2. running worker count
 *  3. completed issues
 *  4. issues waiting on user input
 *  5. blocked issues
 *  6. issues in progress
 *  7. spawn errors (drained)
 *
 * Store reads are eventually consistent with worker progress; a worker that
 * finishes between two turns shows up once its issue reaches a queried status.
 */

import { errorMessage } from '../../core/errors.js'
import type { IssueStatus } from '../../core/types.js'
import type { OrphanScanner } from '../../recovery/orphan-scanner.js'
import type { ForemanConfig } from '../config/config-schema.js'
import type { IssueReader } from '../issue-store/issue-client.js'
import type { Issue } from '../issue-store/issue-schema.js'
import type { SpawnErrorLog } from '../worker-tracker/spawn-error-log.js'
import type { WorkerTaskTracker } from '../worker-tracker/worker-task-tracker.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('progress-reporter')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProgressReporterOptions {
  tracker: Pick<WorkerTaskTracker, 'runningCount'>
  scanner: Pick<OrphanScanner, 'takePendingOrphans'>
  spawnErrors: Pick<SpawnErrorLog, 'drain'>
  config: Pick<ForemanConfig, 'progress_preview_limit'>
}

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

/**
 * Render up to `limit` issues as `  - #<id>: <title>` lines, followed by a
 * count of the ones left out.
 */
export function previewIssues(
  issues: readonly Issue[],
  limit: number,
  detail: (issue: Issue) => string = () => '',
): string[] {
  const lines = issues.slice(0, limit).map((issue) => `  - #${issue.id}: ${issue.title}${detail(issue)}`)
  if (issues.length > limit) {
    lines.push(`  ... and ${issues.length - limit} more`)
  }
  return lines
}

function blockReason(issue: Issue): string {
  return issue.block_reason ? ` (reason: ${issue.block_reason})` : ''
}

// ---------------------------------------------------------------------------
// ProgressReporter
// ---------------------------------------------------------------------------

export class ProgressReporter {
  private readonly _tracker: Pick<WorkerTaskTracker, 'runningCount'>
  private readonly _scanner: Pick<OrphanScanner, 'takePendingOrphans'>
  private readonly _spawnErrors: Pick<SpawnErrorLog, 'drain'>
  private readonly _limit: number

  constructor(options: ProgressReporterOptions) {
    this._tracker = options.tracker
    this._scanner = options.scanner
    this._spawnErrors = options.spawnErrors
    this._limit = options.config.progress_preview_limit
  }

  /**
   * Build the progress digest. With no issue reader (no issue tool this turn)
   * only the in-memory sections are reported.
   *
   * @returns the digest lines joined by newlines, or '' when there is nothing to report
   */
  async checkWorkerProgress(issues: IssueReader | null): Promise<string> {
    const sections: string[] = []

    const orphans = this._scanner.takePendingOrphans()
    if (orphans.length > 0) {
      sections.push(
        `⚠️ ${orphans.length} orphaned issue(s) found from a previous session (no live worker):`,
        ...previewIssues(orphans, this._limit),
      )
    }

    const running = this._tracker.runningCount()
    if (running > 0) {
      sections.push(`🔧 ${running} worker(s) running`)
    }

    if (issues !== null) {
      const completed = await this._query(issues, 'completed')
      if (completed.length > 0) {
        sections.push(`✅ ${completed.length} issue(s) completed by workers`)
      }

      const pending = await this._query(issues, 'pending_user_input')
      if (pending.length > 0) {
        sections.push(`⚠️ ${pending.length} issue(s) need user input:`, ...previewIssues(pending, this._limit))
      }

      const blocked = await this._query(issues, 'blocked')
      if (blocked.length > 0) {
        sections.push(
          `🚫 ${blocked.length} issue(s) blocked:`,
          ...previewIssues(blocked, this._limit, blockReason),
        )
      }

      const inProgress = await this._query(issues, 'in_progress')
      if (inProgress.length > 0) {
        sections.push(`⏳ ${inProgress.length} issue(s) in progress`)
      }
    }

    const errors = this._spawnErrors.drain()
    if (errors.length > 0) {
      sections.push('❌ Worker spawn errors:', ...errors.map((message) => `  - ${message}`))
    }

    return sections.join('\n')
  }

  private async _query(issues: IssueReader, status: IssueStatus): Promise<Issue[]> {
    try {
      return await issues.listByStatus(status)
    } catch (err) {
      logger.warn({ status, error: errorMessage(err) }, 'Progress check could not list issues')
      return []
    }
  }
}
