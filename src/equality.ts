/**
 * Equality helpers shared by containers and declarations.
 */

/**
 * Default equality for container values: strict equality, except that `NaN`
 * equals `NaN`.
 */
function strictEqual<T>(a: T, b: T): boolean {
  return Object.is(a, b) || a === b
}

/**
 * A deep equality check for arrays and plain objects. Used to decide
 * whether an attribute (a list of choices, a limits pair) actually changed.
 */
function deepEqual(a: unknown, b: unknown): boolean {
  if (strictEqual(a, b)) return true

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false
    }
    return true
  }

  if (typeof a === 'object' && typeof b === 'object' && a !== null && b !== null) {
    if (Array.isArray(a) || Array.isArray(b)) return false
    const entriesA = Object.entries(a)
    const entriesB = new Map(Object.entries(b))
    if (entriesA.length !== entriesB.size) return false
    for (const [key, value] of entriesA) {
      if (!entriesB.has(key) || !deepEqual(value, entriesB.get(key))) return false
    }
    return true
  }

  return false
}

export { strictEqual, deepEqual }
