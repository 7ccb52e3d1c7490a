import { describe, it, expect } from 'vitest';

import { ErrorCodes, ValidationError } from '@errors';

import { ExcuseRequestSchema, parseExcuseRequest } from '../schema';
import { createExcuseRequest } from '../../../../../test/factories';

function validationErrorFor(input: unknown): ValidationError {
  try {
    parseExcuseRequest(input);
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('ExcuseRequestSchema', () => {
  it('accepts a complete request', () => {
    const request = createExcuseRequest();
    expect(parseExcuseRequest(request)).toEqual(request);
  });

  it('ignores unknown fields', () => {
    const parsed = parseExcuseRequest({ ...createExcuseRequest(), extra: 'ignored' });
    expect(parsed).not.toHaveProperty('extra');
  });

  it.each([1, 5])('accepts seriousness %i', seriousness => {
    expect(ExcuseRequestSchema.safeParse(createExcuseRequest({ seriousness })).success).toBe(true);
  });

  it.each([0, 6])('rejects seriousness %i with the range message', seriousness => {
    const error = validationErrorFor(createExcuseRequest({ seriousness }));

    expect(error.message).toBe('Seriousness must be between 1 and 5');
    expect(error.code).toBe(ErrorCodes.VALIDATION_ERROR);
    expect(error.statusCode).toBe(400);
  });

  it('rejects a fractional seriousness', () => {
    expect(validationErrorFor(createExcuseRequest({ seriousness: 2.5 })).message).toBe('Seriousness must be an integer');
  });

  it('rejects a seriousness sent as a string', () => {
    expect(validationErrorFor({ ...createExcuseRequest(), seriousness: '3' }).message).toBe(
      'Seriousness must be an integer'
    );
  });

  it.each([
    ['recipient_name', { recipient_name: '' }],
    ['sender_name', { sender_name: '' }],
  ])('rejects an empty %s', (_field, overrides) => {
    expect(validationErrorFor(createExcuseRequest(overrides)).message).toBe(
      'Recipient name and sender name are required'
    );
  });

  it('rejects a missing name', () => {
    const { sender_name: _omitted, ...rest } = createExcuseRequest();
    expect(validationErrorFor(rest).message).toBe('Recipient name and sender name are required');
  });

  it('rejects a body that is not an object', () => {
    expect(validationErrorFor('not an object').statusCode).toBe(400);
    expect(validationErrorFor(null).statusCode).toBe(400);
  });

  it('lists every issue in details', () => {
    const error = validationErrorFor(createExcuseRequest({ seriousness: 9, recipient_name: '' }));

    expect(error.details).toEqual([
      { path: ['seriousness'], message: 'Seriousness must be between 1 and 5', code: 'too_big' },
      { path: ['recipient_name'], message: 'Recipient name and sender name are required', code: 'too_small' },
    ]);
  });
});
