import { Effect } from 'effect'
import { LoggerEffectLayer } from '@/infrastructure/logging/effect-logger'
import { type CrudError, StorageError } from './errors'
import type { Program } from './operations'

// Storage failures reach the caller exactly as the driver raised them
function surface(error: CrudError): unknown {
  return error instanceof StorageError ? error.cause : error
}

/** Runs a program to completion on the calling thread. Throws the failure. */
export function runBlocking<A, E extends CrudError>(program: Program<A, E>): A {
  const result = Effect.runSync(Effect.either(Effect.provide(program, LoggerEffectLayer)))
  if (result._tag === 'Left') {
    throw surface(result.left)
  }
  return result.right
}

/** Runs a program, suspending at each storage call. Rejects with the failure. */
export async function runSuspending<A, E extends CrudError>(program: Program<A, E>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(Effect.provide(program, LoggerEffectLayer)))
  if (result._tag === 'Left') {
    throw surface(result.left)
  }
  return result.right
}
