import { describe, it, expect, vi } from 'vitest'
import type { Issue } from '../../issue-store/issue-schema.js'
import { dispatchToolCalls, renderToolOutput, toToolSpecs } from '../tool-dispatcher.js'
import { InMemoryIssueTool, RecordingHooks, makeTool } from '../../../../test/helpers/fakes.js'

describe('renderToolOutput', () => {
  it('passes strings through', () => {
    expect(renderToolOutput('done')).toBe('done')
  })

  it('serializes objects as JSON', () => {
    expect(renderToolOutput({ issues: [] })).toBe('{"issues":[]}')
  })

  it('stringifies other values', () => {
    expect(renderToolOutput(42)).toBe('42')
    expect(renderToolOutput(null)).toBe('null')
  })
})

describe('toToolSpecs', () => {
  it('names each tool by its key', () => {
    const tool = makeTool(async () => ({ output: '' }), 'Reads files')
    expect(toToolSpecs({ read_file: tool })).toEqual([
      { name: 'read_file', description: 'Reads files', parameters: { type: 'object' } },
    ])
  })
})

describe('dispatchToolCalls', () => {
  it('runs calls sequentially in the order given', async () => {
    const order: string[] = []
    const slow = makeTool(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5))
      order.push('slow')
      return { output: 'slow done' }
    })
    const fast = makeTool(async () => {
      order.push('fast')
      return { output: 'fast done' }
    })

    const results = await dispatchToolCalls(
      [
        { id: '1', name: 'slow', arguments: {} },
        { id: '2', name: 'fast', arguments: {} },
      ],
      { tools: { slow, fast }, hooks: null, issueTool: 'issue_manager', onIssueCreated: async () => undefined },
    )

    expect(order).toEqual(['slow', 'fast'])
    expect(results).toEqual([
      { role: 'tool', toolCallId: '1', content: 'slow done' },
      { role: 'tool', toolCallId: '2', content: 'fast done' },
    ])
  })

  it('hands the created issue to the spawn callback before the next call runs', async () => {
    const store = new InMemoryIssueTool()
    const seen: string[] = []
    const onIssueCreated = vi.fn(async (issue: Issue) => {
      seen.push(`spawn ${issue.id}`)
    })
    const after = makeTool(async () => {
      seen.push('next tool')
      return { output: 'ok' }
    })

    await dispatchToolCalls(
      [
        { id: '1', name: 'issue_manager', arguments: { operation: 'create', params: { title: 'Write tests' } } },
        { id: '2', name: 'after', arguments: {} },
      ],
      { tools: { issue_manager: store, after }, hooks: null, issueTool: 'issue_manager', onIssueCreated },
    )

    expect(seen).toEqual(['spawn 1', 'next tool'])
  })

  it('does not spawn when create output carries no issue', async () => {
    const onIssueCreated = vi.fn(async () => undefined)
    const odd = makeTool(async () => ({ output: { created: true } }))

    const results = await dispatchToolCalls(
      [{ id: '1', name: 'tracker', arguments: { operation: 'create' } }],
      { tools: { tracker: odd }, hooks: null, issueTool: 'tracker', onIssueCreated },
    )

    expect(onIssueCreated).not.toHaveBeenCalled()
    expect(results[0]?.content).toBe('{"created":true}')
  })

  it('emits tool:post with the result on success', async () => {
    const hooks = new RecordingHooks()
    const tool = makeTool(async () => ({ output: { ok: true } }))

    await dispatchToolCalls([{ id: '1', name: 'check', arguments: { deep: false } }], {
      tools: { check: tool },
      hooks,
      issueTool: 'issue_manager',
      onIssueCreated: async () => undefined,
    })

    expect(hooks.events).toEqual([
      { event: 'tool:pre', payload: { tool_name: 'check', arguments: { deep: false } } },
      { event: 'tool:post', payload: { tool_name: 'check', result: { ok: true } } },
    ])
  })
})
