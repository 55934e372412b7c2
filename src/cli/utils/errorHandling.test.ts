import { describe, expect, it } from 'vitest';
import { ConflictError, GenerationUnavailableError, NotFoundError } from '../../errors.js';
import { describeError, exitCodeFor } from './errorHandling.js';

describe('exitCodeFor', () => {
  it('should map error codes to distinct exit codes', () => {
    expect(exitCodeFor(new GenerationUnavailableError('down', { attempts: 3 }))).toBe(3);
    expect(exitCodeFor(new ConflictError('session_1', 1, 2))).toBe(5);
    expect(exitCodeFor(new NotFoundError('run_1'))).toBe(7);
  });

  it('should use 1 for errors without a code', () => {
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });
});

describe('describeError', () => {
  it('should name the code and the entity', () => {
    const error = new GenerationUnavailableError('Could not generate the next question: timed out', {
      attempts: 3,
      entityId: 'session_1',
    });

    expect(describeError(error)).toBe(
      'Error [GENERATION_UNAVAILABLE] (session_1): Could not generate the next question: timed out'
    );
  });

  it('should fall back to the message of plain errors', () => {
    expect(describeError(new Error('boom'))).toBe('Error: boom');
    expect(describeError(42)).toBe('Error: 42');
  });
});
