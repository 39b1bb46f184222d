/**
 * Abstract base repository
 *
 * Provides common utilities: DB access and Zod validation.
 */

import type Database from 'better-sqlite3';
import type { z } from 'zod';
import { ValidationError } from '../errors';

export abstract class BaseRepository {
  constructor(protected readonly db: Database.Database) {}

  /**
   * Validate data against a Zod schema. Throws ValidationError on failure.
   */
  protected validate<T>(schema: z.ZodType<T>, data: unknown): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new ValidationError(
        `Validation failed: ${result.error.message}`,
        result.error.issues,
      );
    }
    return result.data;
  }
}
