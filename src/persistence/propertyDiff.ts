/**
 * Property diffing against a source's default-constructed baseline.
 *
 * Only values that differ from the baseline are persisted. Numbers compare
 * with an absolute epsilon so float round-trips do not produce spurious diffs.
 */

import type { PropertyMap, PropertyValue } from '../types';

function isMap(value: PropertyValue): value is PropertyMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Deep equality with an epsilon for numbers. */
export function valuesEqual(a: PropertyValue, b: PropertyValue, epsilon: number): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) return Number.isNaN(a) && Number.isNaN(b);
    return a === b || Math.abs(a - b) <= epsilon;
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      const left = a[i];
      const right = b[i];
      if (left === undefined || right === undefined) return false;
      if (!valuesEqual(left, right, epsilon)) return false;
    }
    return true;
  }

  if (isMap(a) && isMap(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    for (const key of keys) {
      const left = a[key];
      const right = b[key];
      if (left === undefined || right === undefined) return false;
      if (!valuesEqual(left, right, epsilon)) return false;
    }
    return true;
  }

  return a === b;
}

/** Keys of `live` whose value is absent from, or differs from, `baseline`. */
export function diffProperties(
  live: PropertyMap,
  baseline: PropertyMap | null,
  epsilon: number,
): PropertyMap {
  const diff: PropertyMap = {};
  for (const [key, value] of Object.entries(live)) {
    const base = baseline?.[key];
    if (base === undefined || !valuesEqual(value, base, epsilon)) {
      diff[key] = structuredClone(value);
    }
  }
  return diff;
}

/** Baseline overlaid with a stored diff. */
export function mergeProperties(baseline: PropertyMap | null, diff: PropertyMap): PropertyMap {
  return { ...structuredClone(baseline ?? {}), ...structuredClone(diff) };
}
