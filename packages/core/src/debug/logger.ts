// --- Debug log ---

export type DebugPhase = 'skip-check' | 'fixture' | 'compile' | 'execution' | 'decode' | 'comparison'

export interface DebugLogEntry {
  timestamp: number
  phase: DebugPhase
  message: string
  details?: unknown
}

export function debugEntry(phase: DebugPhase, message: string, durationMs: number, details?: unknown): DebugLogEntry {
  const result: DebugLogEntry = {
    timestamp: Date.now(),
    phase,
    message: `${message} (${durationMs.toFixed(1)}ms)`,
  }
  if (details !== undefined) result.details = details
  return result
}

/**
 * Times `fn` and appends an entry to `log` when it succeeds. A missing log
 * disables recording.
 */
export async function withDebugLog<T>(
  log: DebugLogEntry[] | undefined,
  phase: DebugPhase,
  message: string,
  fn: () => Promise<T>,
  details?: (value: T) => unknown,
): Promise<T> {
  const t0 = Date.now()
  const value = await fn()
  if (log !== undefined) log.push(debugEntry(phase, message, Date.now() - t0, details?.(value)))
  return value
}
