export type Milliseconds = number

/** Wall-clock reads, kept separate so tests can pin them. */
export type TimeSource = {
  now(): Date

  /** Milliseconds since the Unix epoch; prefer this for arithmetic. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /**
   * Wait `ms` milliseconds.
   *
   * Aborting `signal` ends the wait early and resolves rather than rejects,
   * so a retry loop can treat shutdown and timeout alike.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
