import { ulid } from 'ulid';

export function generateId(): string {
  return ulid();
}

const ULID_REGEX = /^[0-9A-HJKMNP-TV-Z]{26}$/;

export function isValidId(id: string): boolean {
  if (!id || typeof id !== 'string') return false;
  return ULID_REGEX.test(id);
}
