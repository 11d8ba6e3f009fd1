import { sprintStartFor } from '../sprint/sprint.calendar.js';
import { parseIsoDate, toIsoDate } from '../utils/date.js';

export interface ValidationResult {
  isValid: boolean;
  error?: string;
}

const VALID: ValidationResult = { isValid: true };

export function validateIsoDate(field: string, value: string): ValidationResult {
  if (!parseIsoDate(value)) {
    return { isValid: false, error: `${field} "${value}" is not a valid yyyy-MM-dd date` };
  }
  return VALID;
}

export function validateStartPct(field: string, value: number): ValidationResult {
  if (!(value > 0 && value <= 1)) {
    return { isValid: false, error: `${field} must be greater than 0 and at most 1 (got ${value})` };
  }
  return VALID;
}

export function validateFraction(field: string, value: number): ValidationResult {
  if (!(value >= 0 && value <= 1)) {
    return { isValid: false, error: `${field} must be between 0 and 1 (got ${value})` };
  }
  return VALID;
}

export function validateNonNegative(field: string, value: number): ValidationResult {
  if (!(value >= 0)) {
    return { isValid: false, error: `${field} must not be negative (got ${value})` };
  }
  return VALID;
}

export function validatePositiveInteger(field: string, value: number): ValidationResult {
  if (!Number.isInteger(value) || value < 1) {
    return { isValid: false, error: `${field} must be a positive integer (got ${value})` };
  }
  return VALID;
}

/**
 * A member who both joins and leaves must join strictly before leaving.
 * Both dates are expected to be valid already.
 */
export function validateTenure(field: string, startDate?: string, leaveDate?: string): ValidationResult {
  if (!startDate || !leaveDate) {
    return VALID;
  }

  const start = parseIsoDate(startDate);
  const leave = parseIsoDate(leaveDate);
  if (start && leave && leave <= start) {
    return {
      isValid: false,
      error: `${field} leave_date ${leaveDate} must be after start_date ${startDate}`,
    };
  }
  return VALID;
}

/** Sprint anchors must be sprint starts so every computed sprint start lines up with them. */
export function validateSprintStart(field: string, value: string): ValidationResult {
  const parsed = parseIsoDate(value);
  if (!parsed) {
    return VALID;
  }
  if (parsed.weekday !== 1) {
    return { isValid: false, error: `${field} ${value} must be a Monday` };
  }
  const start = sprintStartFor(parsed);
  if (!start.equals(parsed)) {
    return { isValid: false, error: `${field} ${value} is not a sprint start; its sprint starts ${toIsoDate(start)}` };
  }
  return VALID;
}
