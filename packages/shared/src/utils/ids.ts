import { monotonicFactory } from 'ulid';
import { v4 as uuidv4 } from 'uuid';

const CROCKFORD_BASE32 = /^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/;

const ulid = monotonicFactory();

/** Sortable id for import runs and log correlation. */
export function generateUlid(): string {
  return ulid();
}

export function isValidUlid(value: string): boolean {
  if (typeof value !== 'string' || value.length !== 26) {
    return false;
  }
  return CROCKFORD_BASE32.test(value);
}

/** Entity ids (lists, items, images) are UUIDs, matching the export format. */
export function generateUuid(): string {
  return uuidv4();
}
