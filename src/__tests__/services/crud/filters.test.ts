import { getTableColumns, type SQL } from 'drizzle-orm'
import { SQLiteSyncDialect } from 'drizzle-orm/sqlite-core'
import { describe, expect, it } from 'vitest'
import { users } from '@/db/schema'
import { buildFilterConditions, combineConditions } from '@/services/crud'

const dialect = new SQLiteSyncDialect()
const columns = getTableColumns(users)

function render(condition: SQL | undefined) {
  if (condition === undefined) return undefined
  const { sql, params } = dialect.sqlToQuery(condition)
  return { sql, params }
}

describe('buildFilterConditions', () => {
  it('returns no conditions for a missing or empty filter', () => {
    expect(buildFilterConditions(columns, undefined)).toEqual([])
    expect(buildFilterConditions(columns, {})).toEqual([])
  })

  it('turns a scalar into an equality predicate', () => {
    const [condition] = buildFilterConditions(columns, { username: 'alice' })
    expect(render(condition)).toEqual({ sql: '"users"."username" = ?', params: ['alice'] })
  })

  it('encodes values through the column mapping', () => {
    const [condition] = buildFilterConditions(columns, { isActive: false })
    expect(render(condition)).toEqual({ sql: '"users"."is_active" = ?', params: [0] })
  })

  it('turns arrays and sets into membership predicates', () => {
    const [fromArray] = buildFilterConditions(columns, { username: ['a', 'b'] })
    const [fromSet] = buildFilterConditions(columns, { username: new Set(['a', 'b']) })

    const expected = { sql: '"users"."username" in (?, ?)', params: ['a', 'b'] }
    expect(render(fromArray)).toEqual(expected)
    expect(render(fromSet)).toEqual(expected)
  })

  it('skips null and undefined values and unknown fields', () => {
    expect(
      buildFilterConditions(columns, { username: null, email: undefined, nickname: 'x' }),
    ).toEqual([])
  })

  it('uses the column keys rather than the stored names', () => {
    expect(buildFilterConditions(columns, { full_name: 'Alice' })).toEqual([])
    expect(buildFilterConditions(columns, { fullName: 'Alice' })).toHaveLength(1)
  })
})

describe('combineConditions', () => {
  it('returns undefined when there is nothing to combine', () => {
    expect(combineConditions([])).toBeUndefined()
  })

  it('ANDs every predicate', () => {
    const combined = combineConditions(
      buildFilterConditions(columns, { username: 'alice', isActive: true }),
    )
    expect(render(combined)).toEqual({
      sql: '("users"."username" = ? and "users"."is_active" = ?)',
      params: ['alice', 1],
    })
  })
})
