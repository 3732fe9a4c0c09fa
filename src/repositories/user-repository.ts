import type { User } from '@/db/schema'
import { users } from '@/db/schema'
import { specializeAsyncCrud, specializeCrud } from '@/services/crud'
import type { BlockingSession, SuspendingSession } from '@/services/crud'
import { UserFilterSchema, UserInputSchema, UserUpdateInputSchema } from '@/types/user'

const UserAccessor = specializeCrud(users, UserInputSchema, UserUpdateInputSchema, UserFilterSchema)
const AsyncUserAccessor = specializeAsyncCrud(
  users,
  UserInputSchema,
  UserUpdateInputSchema,
  UserFilterSchema,
)

export class UserRepository extends UserAccessor {
  constructor(session: BlockingSession) {
    super(session, 'id')
  }

  findByUsername(username: string): User | null {
    return this.read({ filter: { username }, limit: 1 }).at(0) ?? null
  }
}

export class AsyncUserRepository extends AsyncUserAccessor {
  constructor(session: SuspendingSession) {
    super(session, 'id')
  }

  async findByUsername(username: string): Promise<User | null> {
    const matches = await this.read({ filter: { username }, limit: 1 })
    return matches.at(0) ?? null
  }
}
