/**
 * Unit tests for OrphanScanner
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { createEventBus } from '../../core/event-bus.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { IssueClient } from '../../modules/issue-store/issue-client.js'
import { OrphanScanner } from '../orphan-scanner.js'
import { InMemoryIssueTool } from '../../../test/helpers/fakes.js'
import type { StoredIssue } from '../../../test/helpers/fakes.js'

describe('OrphanScanner', () => {
  let tool: InMemoryIssueTool
  let bus: TypedEventBus
  let live: Set<string>
  let scanner: OrphanScanner

  beforeEach(() => {
    tool = new InMemoryIssueTool()
    bus = createEventBus()
    live = new Set<string>()
    scanner = new OrphanScanner({ tracker: { isLive: (id) => live.has(id) }, eventBus: bus })
  })

  function seedAll(issues: Partial<StoredIssue>[]): void {
    for (const issue of issues) tool.seed(issue)
  }

  it('collects open issues and in-progress issues without a live worker', async () => {
    seedAll([
      { id: '1', title: 'Open one', status: 'open' },
      { id: '2', title: 'Stale claim', status: 'in_progress' },
      { id: '3', title: 'Live claim', status: 'in_progress' },
      { id: '4', title: 'Done', status: 'completed' },
    ])
    live.add('3')

    const found = await scanner.maybeRecoverOrphanedIssues(new IssueClient(tool))

    expect(found).toBe(2)
    expect(scanner.takePendingOrphans().map((issue) => issue.id)).toEqual(['1', '2'])
  })

  it('runs at most once per process', async () => {
    seedAll([{ id: '1', title: 'Open one', status: 'open' }])
    const client = new IssueClient(tool)

    expect(await scanner.maybeRecoverOrphanedIssues(client)).toBe(1)
    seedAll([{ id: '2', title: 'Another', status: 'open' }])
    expect(await scanner.maybeRecoverOrphanedIssues(client)).toBe(0)
    expect(scanner.hasRun).toBe(true)
    expect(tool.calls.filter((call) => call.operation === 'list')).toHaveLength(2)
  })

  it('treats a failed status query as contributing nothing', async () => {
    seedAll([
      { id: '1', title: 'Open one', status: 'open' },
      { id: '2', title: 'Stale claim', status: 'in_progress' },
    ])
    tool.failingStatuses.add('open')

    expect(await scanner.maybeRecoverOrphanedIssues(new IssueClient(tool))).toBe(1)
    expect(scanner.takePendingOrphans().map((issue) => issue.id)).toEqual(['2'])
  })

  it('still counts as run when every query fails', async () => {
    tool.failingStatuses.add('open')
    tool.failingStatuses.add('in_progress')
    const client = new IssueClient(tool)

    expect(await scanner.maybeRecoverOrphanedIssues(client)).toBe(0)
    tool.failingStatuses.clear()
    seedAll([{ id: '1', title: 'Open one', status: 'open' }])
    expect(await scanner.maybeRecoverOrphanedIssues(client)).toBe(0)
  })

  it('drains the pending list', async () => {
    seedAll([{ id: '1', title: 'Open one', status: 'open' }])
    await scanner.maybeRecoverOrphanedIssues(new IssueClient(tool))

    expect(scanner.takePendingOrphans()).toHaveLength(1)
    expect(scanner.takePendingOrphans()).toEqual([])
  })

  it('emits recovery:complete with the orphan count', async () => {
    const seen: number[] = []
    bus.on('recovery:complete', ({ orphaned }) => seen.push(orphaned))
    seedAll([{ id: '1', title: 'Open one', status: 'open' }])

    await scanner.maybeRecoverOrphanedIssues(new IssueClient(tool))

    expect(seen).toEqual([1])
  })
})
