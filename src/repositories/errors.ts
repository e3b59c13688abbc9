import mongoose from 'mongoose';

export type UniqueEntity = 'user' | 'student' | 'staff' | 'hod' | 'subject' | 'syllabus';

/** A write rejected by one of the store's unique indexes. */
export class UniqueConstraintError extends Error {
  readonly entity: UniqueEntity;
  readonly fields: string[];

  constructor(entity: UniqueEntity, fields: string[]) {
    super(`Duplicate ${entity} (${fields.join(', ') || 'unknown key'})`);
    this.name = 'UniqueConstraintError';
    this.entity = entity;
    this.fields = fields;
  }

  involves(field: string): boolean {
    return this.fields.includes(field);
  }
}

const DUPLICATE_KEY = 11000;

/**
 * Maps a MongoDB duplicate-key failure to UniqueConstraintError, renaming index keys
 * to record field names (`staff` → `staffId`). Anything else is returned unchanged.
 */
export function translateWriteError(
  error: unknown,
  entity: UniqueEntity,
  rename: Record<string, string> = {}
): unknown {
  if (!(error instanceof mongoose.mongo.MongoServerError) || error.code !== DUPLICATE_KEY) {
    return error;
  }
  const pattern: unknown = error.keyPattern;
  const keys = typeof pattern === 'object' && pattern !== null ? Object.keys(pattern) : [];
  return new UniqueConstraintError(
    entity,
    keys.map((key) => rename[key] ?? key)
  );
}
