/**
 * Domain Layer - Pure logic with no I/O dependencies.
 */

export { IdentityNormalizer, NAME_RULES, REMOTE_RULES } from './IdentityNormalizer'
export type { TransformRule } from './IdentityNormalizer'
