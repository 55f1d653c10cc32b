/**
 * IdentityNormalizer - Pure functions for canonicalizing tracked-branch keys
 *
 * A repository locator and a full ref name are reduced to the (remote, name)
 * pair the tracking service matches on. Each chain is folded left to right,
 * so every rule sees the output of the rule before it.
 */

import type { NormalizedIdentity } from '@shared/types'

export type TransformRule = {
  readonly description: string
  readonly pattern: RegExp
  readonly replacement: string
}

export const REMOTE_RULES: readonly TransformRule[] = [
  {
    description: 'SCHEME://HOST/PATH => HOST:/PATH',
    pattern: /^[a-z][a-z0-9+.-]*:\/\/([^/]+)(?=\/)/i,
    replacement: '$1:'
  },
  {
    description: 'USER@HOST:PATH => HOST:PATH',
    pattern: /^[^@]+@/,
    replacement: ''
  },
  {
    description: 'HOST:/home/USER/PATH => HOST:~USER/PATH',
    pattern: /^([^:]+:)\/home\//,
    replacement: '$1~'
  },
  {
    // Fixed-width: locators shorter than four characters are left alone.
    description: 'Append a missing ".git" suffix',
    pattern: /(?!\.git)(....)$/,
    replacement: '$1.git'
  }
]

export const NAME_RULES: readonly TransformRule[] = [
  {
    description: 'refs/heads/NAME => NAME',
    pattern: /^refs\/heads\/(.*)$/,
    replacement: '$1'
  }
]

export class IdentityNormalizer {
  private constructor() {
    // Static-only class
  }

  /**
   * Applies the rules in order. A rule whose pattern does not match passes
   * its input through unchanged.
   */
  static applyRules(input: string, rules: readonly TransformRule[]): string {
    return rules.reduce((value, rule) => value.replace(rule.pattern, rule.replacement), input)
  }

  static normalizeRemote(remoteLocator: string): string {
    return IdentityNormalizer.applyRules(remoteLocator, REMOTE_RULES)
  }

  static normalizeName(refName: string): string {
    return IdentityNormalizer.applyRules(refName, NAME_RULES)
  }

  /**
   * Normalizes a (locator, ref) pair.
   *
   * @example
   * IdentityNormalizer.normalize('ssh://git.example.com/home/alice/proj', 'refs/heads/main')
   * // => { remote: 'git.example.com:~alice/proj.git', name: 'main' }
   */
  static normalize(remoteLocator: string, refName: string): NormalizedIdentity {
    return {
      remote: IdentityNormalizer.normalizeRemote(remoteLocator),
      name: IdentityNormalizer.normalizeName(refName)
    }
  }

  /**
   * Key used for map lookups; NUL cannot appear in a ref name or a locator.
   */
  static toKey(identity: NormalizedIdentity): string {
    return `${identity.remote}\u0000${identity.name}`
  }
}
