/**
 * Client-facing validation messages.
 */

export const MESSAGES = {
  required: 'This field is required.',
  notNull: 'This field may not be null.',
  invalidString: 'Not a valid string.',
  invalidInteger: 'A valid integer is required.',
  invalidDate: 'Date has wrong format. Use one of these formats instead: YYYY-MM-DD.',
  emptyAction: 'Action cannot be empty.',
  actionTooLong: 'Ensure this field has no more than 255 characters.',
  negativePoints: 'Points must be a positive integer.',
  futureDate: 'Date cannot be in the future.',
} as const;

/**
 * Maximum length of a trimmed action label.
 */
export const ACTION_MAX_LENGTH = 255;

/**
 * Message for a body that is not a JSON object.
 */
export function invalidBodyMessage(data: unknown): string {
  let received: string;
  if (data === null) {
    received = 'null';
  } else if (Array.isArray(data)) {
    received = 'array';
  } else {
    received = typeof data;
  }
  return `Invalid data. Expected an object, but got ${received}.`;
}
