import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { assertValidated, describeZodError, zodIssuesToDetails } from '../validation';
import { AppError, ConflictError, NotFoundError, ValidationError, errorMessage, isAppError } from '../errors';

const schema = z.object({
  name: z.string().min(1),
  lists: z.array(z.object({ id: z.string().uuid() })),
});

describe('assertValidated', () => {
  it('passes through valid data', () => {
    const parsed = schema.safeParse({ name: 'Groceries', lists: [] });
    assertValidated(parsed);
    expect(parsed.data.name).toBe('Groceries');
  });

  it('throws a ValidationError with field details', () => {
    const parsed = schema.safeParse({ name: '', lists: [{ id: 'x' }] });
    try {
      assertValidated(parsed, 'Bad payload');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Bad payload',
        statusCode: 400,
        details: [
          { field: 'name', message: 'String must contain at least 1 character(s)' },
          { field: 'lists.0.id', message: 'Invalid uuid' },
        ],
      });
    }
  });
});

describe('describeZodError', () => {
  it('summarizes the first issue with its path', () => {
    const parsed = schema.safeParse({ name: 'ok', lists: [{ id: 'x' }] });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(describeZodError(parsed.error)).toBe('lists.0.id: Invalid uuid');
      expect(zodIssuesToDetails(parsed.error)).toEqual([{ field: 'lists.0.id', message: 'Invalid uuid' }]);
    }
  });

  it('counts the remaining issues', () => {
    const parsed = schema.safeParse({});
    if (parsed.success) throw new Error('expected failure');
    expect(describeZodError(parsed.error)).toBe('name: Required (+1 more)');
  });
});

describe('errors', () => {
  it('carries code and status', () => {
    expect(new NotFoundError('List', 'abc')).toMatchObject({ code: 'NOT_FOUND', statusCode: 404, message: 'List abc not found' });
    expect(new ConflictError('busy')).toMatchObject({ code: 'CONFLICT', statusCode: 409 });
  });

  it('recognizes app errors', () => {
    expect(isAppError(new ValidationError())).toBe(true);
    expect(isAppError(new Error('plain'))).toBe(false);
    expect(new AppError('X', 'y')).toBeInstanceOf(Error);
  });

  it('extracts a message from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('text')).toBe('text');
  });
});
