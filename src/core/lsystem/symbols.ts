import type { SymbolAlgebra } from "./types";

function isPlainObject(x: unknown): x is Record<string, unknown> {
  if (x === null || typeof x !== "object") return false;
  const proto = Object.getPrototypeOf(x);
  return proto === Object.prototype || proto === null;
}

/**
 * Structural equality over primitives, arrays and plain objects.
 * Other objects (class instances, functions) compare by identity.
 */
export function structuralEquals(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== typeof b) return false;
  if (typeof a === "number" && typeof b === "number") return Number.isNaN(a) && Number.isNaN(b);
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) if (!structuralEquals(a[i], b[i])) return false;
    return true;
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const ak = Object.keys(a).sort();
    const bk = Object.keys(b).sort();
    if (ak.length !== bk.length) return false;
    for (let i = 0; i < ak.length; i++) if (ak[i] !== bk[i]) return false;
    for (const k of ak) if (!structuralEquals(a[k], b[k])) return false;
    return true;
  }
  return false;
}

/**
 * Deep copy of arrays and plain objects; everything else is shared.
 */
export function structuralClone<T>(value: T): T;
export function structuralClone(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => structuralClone(item));
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const k of Object.keys(value)) {
      copy[k] = structuralClone(value[k]);
    }
    return copy;
  }
  return value;
}

export function structuralAlgebra<T>(): SymbolAlgebra<T> {
  return { equals: structuralEquals, clone: structuralClone };
}

/**
 * `===` equality with shared values. Suitable for string, number and enum alphabets.
 */
export function identityAlgebra<T>(): SymbolAlgebra<T> {
  return {
    equals: (a, b) => a === b,
    clone: (value) => value,
  };
}

export function copySequence<T>(seq: readonly T[], algebra: SymbolAlgebra<T>): T[] {
  return seq.map((symbol) => algebra.clone(symbol));
}
