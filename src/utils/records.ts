/**
 * Name-keyed records
 */

/**
 * Empty record without a prototype. Keys such as "__proto__" become
 * ordinary own properties instead of hitting Object.prototype setters.
 */
export function createNameRecord<V>(): Record<string, V> {
  return Object.create(null);
}
