/** Base class for every error the engine raises on bad input or contradictions. */
export class SolverError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SolverError'
  }
}

export class MalformedFeedbackError extends SolverError {
  readonly input: string

  constructor(input: string, reason: string) {
    super(`Malformed feedback "${input}": ${reason} (use five digits of 0, 1, 2)`)
    this.name = 'MalformedFeedbackError'
    this.input = input
  }
}

export class MalformedGuessError extends SolverError {
  readonly input: string

  constructor(input: string) {
    super(`Malformed guess "${input}": expected exactly five letters A-Z`)
    this.name = 'MalformedGuessError'
    this.input = input
  }
}

/**
 * Raised when a round would leave no possible answer, i.e. the feedback
 * contradicts earlier rounds (or the answer is missing from the word list).
 */
export class EmptyCandidateSetError extends SolverError {
  readonly guess: string
  readonly feedback: string

  constructor(guess: string, feedback: string) {
    super(`No words match ${guess} -> ${feedback}; check your inputs`)
    this.name = 'EmptyCandidateSetError'
    this.guess = guess
    this.feedback = feedback
  }
}
