/**
 * Contracts of the agent-hosting framework the foreman runs inside.
 *
 * The foreman never implements these; the host passes them in on every turn.
 * The shapes mirror the host's wire contracts closely because the foreman
 * depends on them exactly (tool names, operation names, parameter keys).
 */

// ---------------------------------------------------------------------------
// Model provider
// ---------------------------------------------------------------------------

/** A tool invocation requested by the model */
export interface ToolCall {
  id: string
  name: string
  arguments: Record<string, unknown>
}

/** Conversation messages handed to the model */
export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
  | { role: 'tool'; toolCallId: string; content: string }

/** Tool description advertised to the model */
export interface ToolSpec {
  name: string
  description: string
  parameters: Record<string, unknown>
}

/** One block of structured model output; only text blocks carry prose */
export interface ContentBlock {
  type: string
  text?: string
}

export interface ChatRequest {
  messages: ChatMessage[]
  tools: ToolSpec[]
}

export interface ChatResponse {
  content: string | readonly ContentBlock[] | null
  toolCalls?: ToolCall[]
}

export interface ModelProvider {
  complete(request: ChatRequest): Promise<ChatResponse>
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export interface ToolResult {
  output: unknown
}

export interface Tool {
  description: string
  inputSchema: Record<string, unknown>
  execute(input: Record<string, unknown>): Promise<ToolResult>
}

// ---------------------------------------------------------------------------
// Hooks
// ---------------------------------------------------------------------------

/** Lifecycle signals the foreman emits to the host */
export type HookEvent =
  | 'prompt:submit'
  | 'execution:start'
  | 'execution:end'
  | 'tool:pre'
  | 'tool:post'
  | 'orchestrator:complete'

/** What a hook handler decided; `deny` is only honoured for prompt:submit */
export interface HookResult {
  action: 'continue' | 'deny'
  reason?: string
}

export interface HookEmitter {
  emit(event: HookEvent, payload: Record<string, unknown>): Promise<HookResult | void>
}

// ---------------------------------------------------------------------------
// Conversation context
// ---------------------------------------------------------------------------

export interface HistoryMessage {
  role: string
  content: string
}

/** Durable conversation history owned by the host session */
export interface ConversationContext {
  getMessages(): Promise<HistoryMessage[]>
  addMessage(message: HistoryMessage): Promise<void>
}

// ---------------------------------------------------------------------------
// Bundles and worker sessions
// ---------------------------------------------------------------------------

/** Provider configuration carried by bundles and sessions; opaque to the foreman */
export interface ProviderConfig {
  module: string
  config?: Record<string, unknown>
}

export interface WorkerSessionOptions {
  parentId: string
  workingDir: string
  issueId: string
}

export interface WorkerSession {
  readonly id: string
  execute(instruction: string, options: { signal: AbortSignal }): Promise<string>
  cleanup(): Promise<void>
}

export interface PreparedBundle {
  createSession(options: WorkerSessionOptions): Promise<WorkerSession>
}

export interface Bundle {
  readonly name: string
  readonly providers: readonly ProviderConfig[]
  prepare(options: { providers: readonly ProviderConfig[] }): Promise<PreparedBundle>
}

export type BundleLoader = (uri: string) => Promise<Bundle>

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

/** The host session the foreman is running in; workers are parented to it */
export interface ParentSession {
  readonly id: string
  readonly providers: readonly ProviderConfig[]
  readonly workingDir?: string
}

/** Record handed to the host so a worker session can be found and resumed later */
export interface WorkerSessionRecord {
  sessionId: string
  parentId: string
  issueId: string
  pool: string
  bundle: string
  output: string
}
