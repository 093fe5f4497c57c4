/**
 * Host hook emission. A failing hook handler is logged and treated as
 * `continue`; only a `prompt:submit` denial changes the turn.
 */

import { errorMessage } from '../../core/errors.js'
import type { HookEmitter, HookEvent, HookResult } from '../../host/types.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('agent-loop')

export async function emitHook(
  hooks: HookEmitter | null,
  event: HookEvent,
  payload: Record<string, unknown>,
): Promise<HookResult | null> {
  if (hooks === null) return null
  try {
    const result = await hooks.emit(event, payload)
    return result ?? null
  } catch (err) {
    logger.warn({ event, error: errorMessage(err) }, 'Hook handler failed')
    return null
  }
}
