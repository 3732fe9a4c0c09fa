import crypto from 'node:crypto'
import { ensureConfigLoaded, getDatabaseConfig } from '../src/config'
import { withDatabase, withSuspendingDatabase } from '../src/db'
import { AsyncUserRepository, UserRepository } from '../src/repositories'
import { toUserOutput } from '../src/types/user'

// 使い捨てのユーザー名（再実行しても unique 制約に当たらないように）
function uniqueName(prefix: string): string {
  return `${prefix}_${crypto.randomUUID().slice(0, 8)}`
}

function runBlockingDemo(): void {
  withDatabase((db) => {
    const repo = new UserRepository(db)
    const username = uniqueName('alice')

    // 1) create
    const created = repo.create({ username, email: `${username}@example.com`, fullName: 'Alice' })
    console.log('✓ create:', toUserOutput(created))

    // 2) readById
    console.log('✓ readById:', repo.readById(created.id))

    // 3) read (page)
    console.log('✓ read(limit=5):', repo.read({ limit: 5 }).length, 'rows')

    // 4) filtered read
    console.log('✓ read(filter username):', repo.read({ filter: { username } }).map((u) => u.id))

    // 5) update
    const updated = repo.update(created.id, { bio: 'Updated from the blocking demo' })
    console.log('✓ update:', { bio: updated.bio, updatedAt: updated.updatedAt })

    // 6) readById after update
    console.log('✓ readById (after update):', repo.readById(created.id)?.bio)

    // 7) delete
    const removed = repo.delete(created.id)
    console.log('✓ delete:', removed?.username)

    // 8) readById after delete
    console.log('✓ readById (after delete):', repo.readById(created.id))
  }, getDatabaseConfig())
}

async function runSuspendingDemo(): Promise<void> {
  await withSuspendingDatabase(async (db) => {
    const repo = new AsyncUserRepository(db)
    const username = uniqueName('bob')

    const created = await repo.create({ username, email: `${username}@example.com` })
    console.log('✓ [async] create:', toUserOutput(created))
    console.log('✓ [async] readById:', await repo.readById(created.id))
    console.log('✓ [async] read(limit=5):', (await repo.read({ limit: 5 })).length, 'rows')
    console.log('✓ [async] findByUsername:', (await repo.findByUsername(username))?.id)

    const updated = await repo.update(created.id, { fullName: 'Bob', isActive: false })
    console.log('✓ [async] update:', { fullName: updated.fullName, isActive: updated.isActive })
    console.log('✓ [async] readById (after update):', (await repo.readById(created.id))?.fullName)

    const removed = await repo.delete(created.id)
    console.log('✓ [async] delete:', removed?.username)
    console.log('✓ [async] readById (after delete):', await repo.readById(created.id))
  }, getDatabaseConfig())
}

async function main() {
  ensureConfigLoaded()
  runBlockingDemo()
  await runSuspendingDemo()
}

main().catch((error: unknown) => {
  console.error('crud demo failed:', error)
  process.exitCode = 1
})
