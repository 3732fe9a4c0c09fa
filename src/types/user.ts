import { z } from 'zod'
import type { User } from '@/db/schema'

// users テーブル用のペイロードスキーマ（作成・更新・検索・出力）

export const UserInputSchema = z.object({
  username: z.string().min(1).max(50),
  email: z.string().email().max(100),
  fullName: z.string().max(100).nullish(),
  bio: z.string().nullish(),
  isActive: z.boolean().default(true),
})

// 省略したキーは「未設定」、null は「null を設定」
export const UserUpdateInputSchema = z.object({
  username: z.string().min(1).max(50).optional(),
  email: z.string().email().max(100).optional(),
  fullName: z.string().max(100).nullish(),
  bio: z.string().nullish(),
  isActive: z.boolean().optional(),
})

export const UserFilterSchema = z.object({
  username: z.union([z.string(), z.array(z.string())]).nullish(),
  email: z.union([z.string().email(), z.array(z.string().email())]).nullish(),
  isActive: z.boolean().nullish(),
})

export const UserOutputSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  email: z.string(),
  fullName: z.string().nullable(),
  bio: z.string().nullable(),
  isActive: z.boolean(),
  createdAt: z.string().nullable(),
  updatedAt: z.string().nullable(),
})

export type UserInput = z.input<typeof UserInputSchema>
export type UserUpdateInput = z.input<typeof UserUpdateInputSchema>
export type UserFilter = z.input<typeof UserFilterSchema>
export type UserOutput = z.infer<typeof UserOutputSchema>

export function toUserOutput(user: User): UserOutput {
  return UserOutputSchema.parse(user)
}
