import { StorageError } from '~/.server/errors';

/**
 * Narrow a TEXT column to one of its allowed values
 */
export function parseEnumColumn<T extends string>(value: string, allowed: readonly T[], column: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new StorageError(`Unexpected value "${value}" in column ${column}`);
  }
  return match;
}
