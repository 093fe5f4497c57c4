/**
 * In-process stand-ins for the host collaborators: issue tool, model
 * provider, bundle loader, hook emitter, conversation context, coordinator.
 */

import type { CapabilityMap, HostCoordinator } from '../../src/host/capabilities.js'
import type {
  Bundle,
  BundleLoader,
  ChatRequest,
  ChatResponse,
  ConversationContext,
  HistoryMessage,
  HookEmitter,
  HookEvent,
  HookResult,
  ModelProvider,
  ParentSession,
  ProviderConfig,
  Tool,
  ToolResult,
  WorkerSession,
  WorkerSessionOptions,
} from '../../src/host/types.js'
import { IssueSchema, type Issue } from '../../src/modules/issue-store/issue-schema.js'

// ---------------------------------------------------------------------------
// Async helpers
// ---------------------------------------------------------------------------

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (reason: Error) => void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  let reject: (reason: Error) => void = () => undefined
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

/** Let every queued microtask and promise chain run to its next real wait */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

// ---------------------------------------------------------------------------
// Issues
// ---------------------------------------------------------------------------

export function makeIssue(fields: Record<string, unknown> & { id: string | number }): Issue {
  return IssueSchema.parse(fields)
}

export interface StoredIssue {
  id: string
  title: string
  description: string
  status: string
  issue_type?: string
  metadata?: Record<string, unknown>
  block_reason?: string
}

export interface IssueToolCall {
  operation: string
  params: Record<string, unknown>
}

/** Issue tool backed by a Map, speaking the list/create/update wire format */
export class InMemoryIssueTool implements Tool {
  readonly description = 'Manage issues'
  readonly inputSchema: Record<string, unknown> = {
    type: 'object',
    properties: { operation: { type: 'string' }, params: { type: 'object' } },
  }

  readonly issues = new Map<string, StoredIssue>()
  readonly calls: IssueToolCall[] = []
  /** Statuses whose list operation throws */
  readonly failingStatuses = new Set<string>()
  private _nextId = 1

  seed(fields: Partial<StoredIssue>): StoredIssue {
    const id = fields.id ?? String(this._nextId)
    this._nextId++
    const issue: StoredIssue = {
      title: `Issue ${id}`,
      description: '',
      status: 'open',
      ...fields,
      id,
    }
    this.issues.set(id, issue)
    return issue
  }

  updates(): IssueToolCall[] {
    return this.calls.filter((c) => c.operation === 'update')
  }

  async execute(input: Record<string, unknown>): Promise<ToolResult> {
    const operation = optionalString(input.operation) ?? ''
    const params = isRecord(input.params) ? input.params : {}
    this.calls.push({ operation, params })

    switch (operation) {
      case 'create': {
        const metadata = isRecord(params.metadata) ? params.metadata : undefined
        const issueType = optionalString(params.issue_type)
        const issue = this.seed({
          title: optionalString(params.title) ?? 'Untitled',
          description: optionalString(params.description) ?? '',
          ...(issueType !== undefined ? { issue_type: issueType } : {}),
          ...(metadata !== undefined ? { metadata } : {}),
        })
        return { output: { issue: { ...issue } } }
      }
      case 'list': {
        const status = optionalString(params.status)
        if (status !== undefined && this.failingStatuses.has(status)) {
          throw new Error(`list ${status} unavailable`)
        }
        const issues = [...this.issues.values()]
          .filter((i) => status === undefined || i.status === status)
          .map((i) => ({ ...i }))
        return { output: { issues } }
      }
      case 'update': {
        const id = String(params.issue_id)
        const issue = this.issues.get(id)
        if (issue === undefined) {
          throw new Error(`Issue ${id} not found`)
        }
        const status = optionalString(params.status)
        if (status !== undefined) issue.status = status
        const reason = optionalString(params.block_reason)
        if (reason !== undefined) issue.block_reason = reason
        return { output: { issue: { ...issue } } }
      }
      default:
        throw new Error(`Unknown operation: ${operation}`)
    }
  }
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

/** A tool whose behaviour is a plain function */
export function makeTool(
  execute: (input: Record<string, unknown>) => Promise<ToolResult>,
  description = 'test tool',
): Tool {
  return { description, inputSchema: { type: 'object' }, execute }
}

// ---------------------------------------------------------------------------
// Model provider
// ---------------------------------------------------------------------------

export type ScriptedStep = ChatResponse | Error

/**
 * Replays scripted responses in order, then the fallback (if any) forever.
 * Each request's message list is copied so later mutation is not observed.
 */
export class ScriptedProvider implements ModelProvider {
  readonly requests: ChatRequest[] = []
  private readonly _steps: ScriptedStep[]

  constructor(steps: ScriptedStep[], private readonly _fallback?: ScriptedStep) {
    this._steps = [...steps]
  }

  async complete(request: ChatRequest): Promise<ChatResponse> {
    this.requests.push({ messages: [...request.messages], tools: [...request.tools] })
    const next = this._steps.shift() ?? this._fallback
    if (next === undefined) {
      throw new Error('No scripted response left')
    }
    if (next instanceof Error) throw next
    return next
  }
}

// ---------------------------------------------------------------------------
// Bundles and worker sessions
// ---------------------------------------------------------------------------

export class FakeWorkerSession implements WorkerSession {
  instruction: string | null = null
  signal: AbortSignal | null = null
  cleanedUp = false
  private readonly _gate = deferred<string>()

  constructor(
    readonly id: string,
    readonly options: WorkerSessionOptions,
    autoFinish: boolean,
  ) {
    if (autoFinish) this._gate.resolve(`done: ${options.issueId}`)
  }

  finish(output = 'done'): void {
    this._gate.resolve(output)
  }

  fail(error: Error): void {
    // Mark handled; execute() may attach its own handler later
    this._gate.promise.catch(() => undefined)
    this._gate.reject(error)
  }

  execute(instruction: string, options: { signal: AbortSignal }): Promise<string> {
    this.instruction = instruction
    this.signal = options.signal
    const signal = options.signal
    return new Promise<string>((resolve, reject) => {
      const onAbort = (): void => {
        reject(signal.reason instanceof Error ? signal.reason : new Error('aborted'))
      }
      if (signal.aborted) {
        onAbort()
        return
      }
      signal.addEventListener('abort', onAbort, { once: true })
      this._gate.promise.then(resolve, reject)
    })
  }

  async cleanup(): Promise<void> {
    this.cleanedUp = true
  }
}

/** Bundle loader that records every step and hands out controllable sessions */
export class FakeBundleHost {
  readonly loads: string[] = []
  readonly prepareCalls: Array<readonly ProviderConfig[]> = []
  readonly sessions: FakeWorkerSession[] = []
  bundleProviders: ProviderConfig[] = []
  loadError: Error | null = null
  executeError: Error | null = null
  /** Sessions finish as soon as they execute */
  autoFinish = false

  readonly load: BundleLoader = async (uri: string): Promise<Bundle> => {
    this.loads.push(uri)
    if (this.loadError !== null) throw this.loadError
    return {
      name: uri,
      providers: this.bundleProviders,
      prepare: async ({ providers }) => {
        this.prepareCalls.push(providers)
        return {
          createSession: async (options: WorkerSessionOptions) => {
            const session = new FakeWorkerSession(
              `worker-${this.sessions.length + 1}`,
              options,
              this.autoFinish,
            )
            if (this.executeError !== null) session.fail(this.executeError)
            this.sessions.push(session)
            return session
          },
        }
      },
    }
  }

  sessionFor(issueId: string): FakeWorkerSession | undefined {
    return [...this.sessions].reverse().find((s) => s.options.issueId === issueId)
  }
}

// ---------------------------------------------------------------------------
// Hooks and context
// ---------------------------------------------------------------------------

export interface RecordedHook {
  event: HookEvent
  payload: Record<string, unknown>
}

export class RecordingHooks implements HookEmitter {
  readonly events: RecordedHook[] = []
  readonly responses: Partial<Record<HookEvent, HookResult>> = {}

  async emit(event: HookEvent, payload: Record<string, unknown>): Promise<HookResult | void> {
    this.events.push({ event, payload })
    return this.responses[event]
  }

  names(): HookEvent[] {
    return this.events.map((e) => e.event)
  }
}

export class MemoryContext implements ConversationContext {
  readonly messages: HistoryMessage[] = []

  async getMessages(): Promise<HistoryMessage[]> {
    return this.messages.map((m) => ({ ...m }))
  }

  async addMessage(message: HistoryMessage): Promise<void> {
    this.messages.push({ ...message })
  }
}

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

export const PARENT_SESSION: ParentSession = {
  id: 'parent-1',
  providers: [{ module: 'provider-test', config: { apiKey: 'test-secret' } }],
  workingDir: '/work/project',
}

export function makeCoordinator(
  capabilities: Partial<CapabilityMap> = {},
  session: ParentSession | null = PARENT_SESSION,
): HostCoordinator {
  return {
    session,
    getCapability: (name) => capabilities[name],
  }
}
