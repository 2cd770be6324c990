/**
 * Readers for the opaque step args payload.
 * Missing or mistyped arguments fail the step with a VALIDATION error.
 */

import type { StepArgs } from '../types/plan';
import { CapabilityError } from '../types/capability';

export function requireString(args: StepArgs, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') {
    throw new CapabilityError('VALIDATION', `Argument "${key}" must be a string`);
  }
  return value;
}

/**
 * A string that must also be non-blank
 */
export function requireText(args: StepArgs, key: string): string {
  const value = requireString(args, key);
  if (value.trim() === '') {
    throw new CapabilityError('VALIDATION', `Argument "${key}" cannot be empty`);
  }
  return value;
}

export function optionalString(args: StepArgs, key: string): string | undefined {
  if (args[key] === undefined || args[key] === null) {
    return undefined;
  }
  return requireString(args, key);
}

export function optionalBoolean(args: StepArgs, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new CapabilityError('VALIDATION', `Argument "${key}" must be a boolean`);
  }
  return value;
}

export function optionalPositiveInt(args: StepArgs, key: string, fallback: number): number {
  const value = args[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new CapabilityError('VALIDATION', `Argument "${key}" must be a positive integer`);
  }
  return value;
}

/**
 * A flat string map; non-string values are stringified
 */
export function optionalStringMap(args: StepArgs, key: string): Record<string, string> {
  const value = args[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new CapabilityError('VALIDATION', `Argument "${key}" must be an object`);
  }
  const map: Record<string, string> = {};
  for (const [entryKey, entryValue] of Object.entries(value)) {
    map[entryKey] = typeof entryValue === 'string' ? entryValue : JSON.stringify(entryValue);
  }
  return map;
}

export function unknownAction(capability: string, action: string): CapabilityError {
  return new CapabilityError('VALIDATION', `Unknown ${capability} action "${action}"`);
}
