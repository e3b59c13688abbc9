import { Types } from 'mongoose';

const OBJECT_ID = /^[0-9a-f]{24}$/i;

/** Parses a 24-hex id; anything else names no record. */
export const toObjectId = (id: string): Types.ObjectId | null =>
  OBJECT_ID.test(id) ? new Types.ObjectId(id) : null;

export const toObjectIds = (ids: readonly string[]): Types.ObjectId[] =>
  ids.flatMap((id) => {
    const parsed = toObjectId(id);
    return parsed ? [parsed] : [];
  });

export function requireObjectId(id: string, field: string): Types.ObjectId {
  const parsed = toObjectId(id);
  if (!parsed) {
    throw new Error(`${field} is not a valid id: ${id}`);
  }
  return parsed;
}
