/**
 * Freezes a value and every object or array reachable from it.
 * Expects: the value is acyclic plain data such as a resolved config.
 */
export function freezeDeep<T>(value: T): T {
    if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
        return value;
    }
    Object.freeze(value);
    for (const entry of Object.values(value)) {
        freezeDeep(entry);
    }
    return value;
}
