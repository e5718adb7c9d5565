/**
 * Creates an empty object without a prototype. Every key assigned to it,
 * `__proto__` included, becomes an own property.
 */
export function createRecord<T>(): Record<string, T> {
    return Object.create(null);
}
