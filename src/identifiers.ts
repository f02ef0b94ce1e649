import { randomUUID } from 'node:crypto';

/**
 * Source of globally unique identifiers.
 */
export interface IdentifierGenerator {
  next(): string;
}

/**
 * Random v4 UUIDs from the platform CSPRNG.
 */
export function createRandomIdentifierGenerator(): IdentifierGenerator {
  return {
    next: () => randomUUID()
  };
}

