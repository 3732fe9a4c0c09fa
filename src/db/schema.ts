import { sql } from 'drizzle-orm'
import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core'

// ユーザーテーブル（汎用CRUDアクセサのサンプルモデル）
export const users = sqliteTable(
  'users',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    username: text('username').notNull().unique(),
    email: text('email').notNull().unique(),
    fullName: text('full_name'),
    bio: text('bio'),
    isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
    createdAt: text('created_at').default(sql`CURRENT_TIMESTAMP`),
    // 作成時は NULL、更新時に created_at と同じ形式で埋める
    updatedAt: text('updated_at')
      .default(sql`NULL`)
      .$onUpdate(() => sql`CURRENT_TIMESTAMP`),
  },
  (table) => ({
    usernameIdx: index('idx_users_username').on(table.username),
  }),
)

export type User = typeof users.$inferSelect
export type NewUser = typeof users.$inferInsert
