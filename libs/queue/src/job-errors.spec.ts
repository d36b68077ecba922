import { JobErrorKind } from '@hairline/database';
import {
  InternalJobError,
  JobNotFoundError,
  JobValidationError,
  UpstreamError,
  toJobError,
} from './job-errors';

describe('job errors', () => {
  it('marks only upstream failures as retryable', () => {
    expect(new UpstreamError('model timed out').retryable).toBe(true);
    expect(new JobValidationError('bad payload').retryable).toBe(false);
    expect(new JobNotFoundError('Certification', 'c1').retryable).toBe(false);
    expect(new InternalJobError('boom').retryable).toBe(false);
  });

  it('carries its kind and class name', () => {
    const error = new JobNotFoundError('Certification', 'c1');

    expect(error.kind).toBe(JobErrorKind.NOT_FOUND);
    expect(error.name).toBe('JobNotFoundError');
    expect(error.message).toBe('Certification c1 not found');
  });

  describe('toJobError', () => {
    it('returns job errors unchanged', () => {
      const original = new UpstreamError('no tool call');
      expect(toJobError(original)).toBe(original);
    });

    it('classifies plain errors as internal and keeps the cause', () => {
      const cause = new TypeError('x is undefined');
      const result = toJobError(cause);

      expect(result).toBeInstanceOf(InternalJobError);
      expect(result.kind).toBe(JobErrorKind.INTERNAL);
      expect(result.message).toBe('x is undefined');
      expect(result.cause).toBe(cause);
    });

    it('stringifies non-error values', () => {
      const result = toJobError('disk full');

      expect(result.kind).toBe(JobErrorKind.INTERNAL);
      expect(result.message).toBe('disk full');
    });
  });
});
