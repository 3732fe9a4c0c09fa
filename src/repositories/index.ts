export { AsyncUserRepository, UserRepository } from './user-repository'
