/**
 * ActionRecord — the single entity tracked by the API.
 *
 * A record is one sustainability action: a label, the calendar day it
 * happened and the points it earned. The `id` is owned by the store.
 */

/**
 * A stored action.
 */
export interface ActionRecord {
  /** Store-assigned identity (positive integer, never reused) */
  id: number;
  /** Trimmed, non-empty label */
  action: string;
  /** Calendar day as YYYY-MM-DD */
  date: string;
  /** Non-negative integer score */
  points: number;
}

/**
 * The client-supplied fields of a record (everything except `id`).
 */
export type ActionInput = Omit<ActionRecord, 'id'>;

/**
 * A partial update. Each attribute is independently optional; an absent
 * attribute keeps the existing value when merged.
 */
export interface ActionPatch {
  action?: string;
  date?: string;
  points?: number;
}

/**
 * Build a record with the canonical field order (id, action, date, points).
 */
export function toActionRecord(id: number, input: ActionInput): ActionRecord {
  return {
    id,
    action: input.action,
    date: input.date,
    points: input.points,
  };
}

/**
 * Overlay the attributes present in `patch` onto `existing`.
 */
export function applyPatch(existing: ActionInput, patch: ActionPatch): ActionInput {
  return {
    action: patch.action ?? existing.action,
    date: patch.date ?? existing.date,
    points: patch.points ?? existing.points,
  };
}

/**
 * Type guard for records read back from storage.
 */
export function isActionRecord(value: unknown): value is ActionRecord {
  if (!isObject(value)) {
    return false;
  }
  const v = value;
  return (
    typeof v.id === 'number' &&
    Number.isInteger(v.id) &&
    v.id > 0 &&
    typeof v.action === 'string' &&
    typeof v.date === 'string' &&
    typeof v.points === 'number' &&
    Number.isInteger(v.points)
  );
}

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
