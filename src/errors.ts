/**
 * Raised when the candidates can no longer lead to a valid completion.
 */
export class ConsistencyError extends Error {
  public readonly kind = 'CandidateConstraintViolation';

  public constructor(message: string) {
    super(message);
    this.name = 'ConsistencyError';
  }
}

/**
 * What techniques and the solver throw. The first inconsistency aborts the
 * current pass; nothing is retried.
 */
export class SolverError extends Error {
  public readonly kind = 'Inconsistent';

  public constructor(public readonly reason: ConsistencyError) {
    super(reason.message, { cause: reason });
    this.name = 'SolverError';
  }
}

export function inconsistent(message: string): SolverError {
  return new SolverError(new ConsistencyError(message));
}
