/**
 * Config differ.
 *
 * Field-level comparison of a desired value against the last-known remote
 * value. Blank or absent input is never a request to clear a remote field.
 */

import type { FieldDiff } from "./types.js";

export const UNSPECIFIED: FieldDiff<never> = { kind: "unspecified" };
export const UNCHANGED: FieldDiff<never> = { kind: "unchanged" };

export function changed<T>(value: T): FieldDiff<T> {
  return { kind: "changed", value };
}

/** `true` for `undefined`, `null` and whitespace-only strings. */
export function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim() === "";
}

/**
 * Compare text. The desired value is trimmed before comparison and is the
 * value written when it differs.
 */
export function diffText(desired: string | null | undefined, current: string | null | undefined): FieldDiff<string> {
  if (desired === undefined || desired === null || isBlank(desired)) return UNSPECIFIED;
  const value = desired.trim();
  return value === (current ?? undefined) ? UNCHANGED : changed(value);
}

/**
 * Compare a scalar. `undefined` desired means "not specified".
 */
export function diffValue<T>(
  desired: T | undefined,
  current: T | null | undefined,
  equals: (a: T, b: T) => boolean = Object.is,
): FieldDiff<T> {
  if (desired === undefined) return UNSPECIFIED;
  if (current !== undefined && current !== null && equals(desired, current)) return UNCHANGED;
  return changed(desired);
}

/** Shallow equality of two string maps. */
export function recordsEqual(a: Readonly<Record<string, string>>, b: Readonly<Record<string, string>>): boolean {
  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}

/**
 * Compare string maps (environment variables, tags). An empty desired map is
 * "not specified".
 */
export function diffRecord(
  desired: Readonly<Record<string, string>> | null | undefined,
  current: Readonly<Record<string, string>> | null | undefined,
): FieldDiff<Record<string, string>> {
  if (!desired || Object.keys(desired).length === 0) return UNSPECIFIED;
  if (current && recordsEqual(desired, current)) return UNCHANGED;
  return changed({ ...desired });
}

/**
 * Compare a composite value as one unit.
 *
 * Sub-fields left `undefined` in `desired` are taken from `current`, so the
 * changed value is always a complete unit. Any sub-field difference marks the
 * whole unit changed.
 */
export function diffUnit<T extends object>(
  desired: Partial<T> | null | undefined,
  current: T | null | undefined,
  keys: readonly (keyof T)[],
): FieldDiff<Partial<T>> {
  if (!desired) return UNSPECIFIED;
  const specified = keys.filter((key) => desired[key] !== undefined);
  if (specified.length === 0) return UNSPECIFIED;

  const merged: Partial<T> = {};
  for (const key of keys) {
    const value = desired[key] !== undefined ? desired[key] : current?.[key];
    if (value !== undefined) merged[key] = value;
  }

  if (current) {
    const base = current;
    if (keys.every((key) => Object.is(merged[key], base[key]))) return UNCHANGED;
  }
  return changed(merged);
}
