/**
 * ActionValidator — field validation for action records using zod.
 *
 * This module:
 * - Builds the record schema ONCE at construction time
 * - Trims the action label and canonicalizes the date
 * - Accepts numeric labels and integer strings for points
 * - Collects every violation per field, never stopping at the first
 * - Reads the clock on each call for the "not in the future" rule
 */

import { z } from 'zod';
import type { ActionInput, ActionPatch } from '../types/ActionRecord.js';
import { NON_FIELD_ERRORS, type FieldErrors, type ValidationOutcome } from '../types/common.js';
import { normalizeIsoDate, toLocalIsoDate } from './dates.js';
import { ACTION_MAX_LENGTH, MESSAGES, invalidBodyMessage } from './messages.js';
import type { ActionValidatorContract, ValidatorOptions } from './types.js';

const INTEGER_STRING = /^\s*-?\d+(\.0*)?\s*$/;

/**
 * Default validator options.
 */
const DEFAULT_OPTIONS: Required<ValidatorOptions> = {
  now: () => new Date(),
};

/**
 * Error map for a single field: missing, null and wrong-type values get
 * their own messages; everything else keeps the check's message.
 */
function fieldErrorMap(invalidTypeMessage: string): z.ZodErrorMap {
  return (issue, ctx) => {
    if (issue.code === z.ZodIssueCode.invalid_type) {
      if (issue.received === z.ZodParsedType.undefined) {
        return { message: MESSAGES.required };
      }
      if (issue.received === z.ZodParsedType.null) {
        return { message: MESSAGES.notNull };
      }
      return { message: invalidTypeMessage };
    }
    return { message: ctx.defaultError };
  };
}

/**
 * Convert zod issues to per-field messages, in reporting order.
 */
function collectFieldErrors(error: z.ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    const head = issue.path[0];
    const field = head === undefined ? NON_FIELD_ERRORS : String(head);
    (errors[field] ??= []).push(issue.message);
  }
  return errors;
}

/**
 * Integer-valued strings such as "10", " 10 " or "10.0" become numbers;
 * anything else is passed through for the type check to reject.
 */
function coerceIntegerString(value: unknown): unknown {
  if (typeof value === 'string' && INTEGER_STRING.test(value)) {
    return Number(value.trim());
  }
  return value;
}

/**
 * Finite numbers become their string form; booleans and objects are
 * passed through for the type check to reject.
 */
function coerceNumberToString(value: unknown): unknown {
  return typeof value === 'number' && Number.isFinite(value) ? String(value) : value;
}

function isPlainObject(data: unknown): data is Record<string, unknown> {
  return data !== null && typeof data === 'object' && !Array.isArray(data);
}

/**
 * Build the full and partial record schemas. `now` is read on every parse.
 */
function createActionSchemas(now: () => Date) {
  const action = z.preprocess(
    coerceNumberToString,
    z
      .string({ errorMap: fieldErrorMap(MESSAGES.invalidString) })
      .trim()
      .min(1, MESSAGES.emptyAction)
      .max(ACTION_MAX_LENGTH, MESSAGES.actionTooLong)
  );

  const date = z
    .string({ errorMap: fieldErrorMap(MESSAGES.invalidDate) })
    .transform((value, ctx) => {
      const normalized = normalizeIsoDate(value);
      if (normalized === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: MESSAGES.invalidDate });
        return z.NEVER;
      }
      // Canonical YYYY-MM-DD strings compare chronologically
      if (normalized > toLocalIsoDate(now())) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: MESSAGES.futureDate });
        return z.NEVER;
      }
      return normalized;
    });

  const points = z.preprocess(
    coerceIntegerString,
    z
      .number({ errorMap: fieldErrorMap(MESSAGES.invalidInteger) })
      .int(MESSAGES.invalidInteger)
      .min(0, MESSAGES.negativePoints)
  );

  // Unknown keys (including a client-supplied id) are stripped
  const full = z.object({ action, date, points });
  return { full, partial: full.partial() };
}

type ActionSchemas = ReturnType<typeof createActionSchemas>;

/**
 * ActionValidator — zod-based validator for action bodies.
 */
export class ActionValidator implements ActionValidatorContract {
  private readonly schemas: ActionSchemas;

  constructor(options: ValidatorOptions = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    this.schemas = createActionSchemas(opts.now);
  }

  validateFull(data: unknown): ValidationOutcome<ActionInput> {
    const body = data === undefined ? {} : data;
    if (!isPlainObject(body)) {
      return { valid: false, errors: { [NON_FIELD_ERRORS]: [invalidBodyMessage(body)] } };
    }

    const result = this.schemas.full.safeParse(body);
    if (!result.success) {
      return { valid: false, errors: collectFieldErrors(result.error) };
    }

    const { action, date, points } = result.data;
    return { valid: true, value: { action, date, points } };
  }

  validatePartial(data: unknown): ValidationOutcome<ActionPatch> {
    const body = data === undefined ? {} : data;
    if (!isPlainObject(body)) {
      return { valid: false, errors: { [NON_FIELD_ERRORS]: [invalidBodyMessage(body)] } };
    }

    const result = this.schemas.partial.safeParse(body);
    if (!result.success) {
      return { valid: false, errors: collectFieldErrors(result.error) };
    }

    const patch: ActionPatch = {};
    if (result.data.action !== undefined) patch.action = result.data.action;
    if (result.data.date !== undefined) patch.date = result.data.date;
    if (result.data.points !== undefined) patch.points = result.data.points;
    return { valid: true, value: patch };
  }
}

/**
 * Create a new ActionValidator instance.
 */
export function createValidator(options?: ValidatorOptions): ActionValidator {
  return new ActionValidator(options);
}
