/**
 * Request body validation helpers
 */
import type { ValidationResult } from '../types/index';

/**
 * Narrows a parsed JSON body to a plain object
 */
export function isJsonObject(body: unknown): body is Record<string, unknown> {
  return typeof body === 'object' && body !== null && !Array.isArray(body);
}

/**
 * Checks that a body was sent and carries every required field
 * @param body - Parsed request body
 * @param requiredFields - Field names that must be present
 */
export function validateRequestData(body: unknown, requiredFields: string[]): ValidationResult {
  if (!isJsonObject(body) || Object.keys(body).length === 0) {
    return { valid: false, message: 'No data provided in request body' };
  }

  const missingFields = requiredFields.filter((field) => !(field in body));
  if (missingFields.length > 0) {
    return { valid: false, message: `Missing required fields: ${missingFields.join(', ')}` };
  }

  return { valid: true, body };
}

/**
 * Keeps the string entries of a list field; null when the field is not an array
 */
export function readStringList(value: unknown): string[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  return value.filter((item): item is string => typeof item === 'string');
}
