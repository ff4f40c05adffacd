/**
 * Row → record conversion helpers. Every column that comes back from the
 * driver is checked once here instead of being trusted downstream.
 */
import { InfrastructureError } from '../services/errors';
import { DIFFICULTY_LEVELS, type DifficultyLevel } from '../types';

export function toIso(value: unknown, column: string): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string' && !Number.isNaN(Date.parse(value))) return new Date(value).toISOString();
  throw new InfrastructureError(`Column ${column} is not a timestamp`);
}

export function toIsoOrNull(value: unknown, column: string): string | null {
  return value === null || value === undefined ? null : toIso(value, column);
}

export function toText(value: unknown, column: string): string {
  if (typeof value !== 'string') throw new InfrastructureError(`Column ${column} is not text`);
  return value;
}

export function toTextOrNull(value: unknown, column: string): string | null {
  return value === null || value === undefined ? null : toText(value, column);
}

export function toIntOrNull(value: unknown, column: string): number | null {
  if (value === null || value === undefined) return null;
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(n)) throw new InfrastructureError(`Column ${column} is not an integer`);
  return n;
}

export function isDifficulty(value: unknown): value is DifficultyLevel {
  return typeof value === 'string' && (DIFFICULTY_LEVELS as readonly string[]).includes(value);
}

export function toDifficulty(value: unknown, column: string): DifficultyLevel {
  if (!isDifficulty(value)) throw new InfrastructureError(`Column ${column} holds an unknown difficulty`);
  return value;
}

/** A JSONB array of nullable strings (answers, feedback). */
export function toSlotArray(value: unknown, column: string): (string | null)[] {
  if (!Array.isArray(value)) throw new InfrastructureError(`Column ${column} is not an array`);
  return value.map((slot: unknown) => {
    if (slot === null || typeof slot === 'string') return slot;
    throw new InfrastructureError(`Column ${column} holds a non-text slot`);
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
