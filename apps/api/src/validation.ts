/**
 * zod request validation with the API's error body.
 *
 * @module @docpilot/api/validation
 */

import { zValidator } from '@hono/zod-validator';
import type { ErrorResponse } from '@docpilot/rag';
import type { ValidationTargets } from 'hono';
import type { ZodSchema } from 'zod';

export const validate = <T extends ZodSchema, Target extends keyof ValidationTargets>(target: Target, schema: T) =>
  zValidator(target, schema, (result, c) => {
    if (!result.success) {
      const body: ErrorResponse = {
        error: 'VALIDATION_ERROR',
        message: 'Invalid request',
        details: result.error.flatten().fieldErrors,
      };
      return c.json(body, 400);
    }
  });
