import {
  describe,
  expect,
  it
} from 'vitest';

import {
  ConsistencyError,
  inconsistent,
  SolverError
} from '../src/errors.ts';

describe('inconsistent', () => {
  it('wraps a consistency error in a solver error', () => {
    const error = inconsistent('Row 1 has no room for 5');
    expect(error).toBeInstanceOf(SolverError);
    expect(error.kind).toBe('Inconsistent');
    expect(error.message).toBe('Row 1 has no room for 5');
    expect(error.reason).toBeInstanceOf(ConsistencyError);
    expect(error.reason.kind).toBe('CandidateConstraintViolation');
    expect(error.cause).toBe(error.reason);
    expect(error.name).toBe('SolverError');
  });
});
