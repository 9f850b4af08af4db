/**
 * Raised when a second run for a source is stored as Running while
 * another one still is.
 */
export class RunningRunExistsError extends Error {
  constructor(readonly source: string) {
    super(`A run for ${source} is already Running`)
    this.name = 'RunningRunExistsError'
  }
}

/**
 * Raised when a write would change a run that already reached a
 * terminal status.
 */
export class TerminalRunError extends Error {
  constructor(readonly runId: string) {
    super(`Run ${runId} is already in a terminal state`)
    this.name = 'TerminalRunError'
  }
}
