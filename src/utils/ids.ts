import { v4 as uuidv4 } from 'uuid';

/**
 * Eight hex characters from a v4 UUID; used to keep generated file names unique.
 */
export function shortUid(): string {
  return uuidv4().replace(/-/g, '').slice(0, 8);
}

/**
 * Collapse anything outside [A-Za-z0-9._-] to underscores.
 */
export function sanitizeForFilename(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^_+|_+$/g, '');
  return cleaned || 'file';
}
