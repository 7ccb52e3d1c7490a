import { z } from 'zod';

import { ValidationError } from '@errors';
import type { ExcuseRequest } from './types';

const NAMES_REQUIRED = 'Recipient name and sender name are required';
const SERIOUSNESS_RANGE = 'Seriousness must be between 1 and 5';

const requiredName = z
  .string({ required_error: NAMES_REQUIRED, invalid_type_error: NAMES_REQUIRED })
  .min(1, NAMES_REQUIRED);

export const ExcuseRequestSchema = z.object({
  category: z.string(),
  tone: z.string(),
  seriousness: z
    .number({ invalid_type_error: 'Seriousness must be an integer' })
    .int('Seriousness must be an integer')
    .min(1, SERIOUSNESS_RANGE)
    .max(5, SERIOUSNESS_RANGE),
  recipient_name: requiredName,
  sender_name: requiredName,
  eta_when: z.string(),
}) satisfies z.ZodType<ExcuseRequest>;

/**
* Validate an incoming request body.
* @throws ValidationError carrying the first issue as its message
*/
export function parseExcuseRequest(input: unknown): ExcuseRequest {
  const result = ExcuseRequestSchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZodIssues(result.error.issues);
  }
  return result.data;
}
