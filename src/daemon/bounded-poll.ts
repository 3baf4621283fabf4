import consola from "consola"

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms))

export interface BoundedPollOptions<T, E> {
  maxAttempts: number
  intervalMs: number
  // Called once per tick after the interval elapses. Returning a value ends
  // the poll; undefined means "not yet".
  check: (attempt: number) => Promise<T | undefined>
  // Called once when the ceiling is reached without a value
  onExhausted: () => Promise<E>
  sleep?: Sleep
  label?: string
}

export type BoundedPollResult<T, E> =
  | { settled: true; value: T; attempts: number }
  | { settled: false; escalation: E; attempts: number }

// pollWithCeiling runs `check` at a fixed interval at most maxAttempts times.
// Shared by start confirmation (ceiling → slow-start warning) and stop
// (ceiling → SIGKILL escalation); it never waits longer than
// maxAttempts * intervalMs plus whatever onExhausted does.
export async function pollWithCeiling<T, E>(
  opts: BoundedPollOptions<T, E>,
): Promise<BoundedPollResult<T, E>> {
  const wait = opts.sleep ?? sleep

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    await wait(opts.intervalMs)
    const value = await opts.check(attempt)
    if (value !== undefined) {
      return { settled: true, value, attempts: attempt }
    }
    if (opts.label) {
      consola.debug(`${opts.label}: waiting (${attempt}/${opts.maxAttempts})`)
    }
  }

  const escalation = await opts.onExhausted()
  return { settled: false, escalation, attempts: opts.maxAttempts }
}
