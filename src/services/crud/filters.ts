import { and, type Column, eq, inArray, type SQL } from 'drizzle-orm'

/**
 * Filter translation.
 *
 * Each filter field that names a column becomes `column = value`, or
 * `column IN (...)` when the value is an array or a Set. Fields that are not
 * columns are ignored. `null`/`undefined` values are skipped rather than turned
 * into `IS NULL`.
 */
export function buildFilterConditions(
  columns: Readonly<Record<string, Column>>,
  filter: Readonly<Record<string, unknown>> | undefined,
): SQL[] {
  if (!filter) return []

  const conditions: SQL[] = []
  for (const [field, value] of Object.entries(filter)) {
    if (value === null || value === undefined) continue
    if (!Object.hasOwn(columns, field)) continue
    const column = columns[field]
    if (Array.isArray(value)) {
      conditions.push(inArray(column, value))
    } else if (value instanceof Set) {
      conditions.push(inArray(column, [...value]))
    } else {
      conditions.push(eq(column, value))
    }
  }
  return conditions
}

/** AND of all conditions; undefined when there are none (unfiltered query) */
export function combineConditions(conditions: SQL[]): SQL | undefined {
  if (conditions.length === 0) return undefined
  return and(...conditions)
}
