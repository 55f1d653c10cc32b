/**
 * Configuration for the notifier and the tracking endpoint.
 *
 * Notifier options come from command-line flags, then the environment, then
 * the repository's `tracker.*` git config keys; the first source that sets
 * an option wins. The endpoint reads the environment only.
 */

import fs from 'fs/promises'
import { z } from 'zod'
import type { Credentials } from '../adapters/tracker/UpdateRequestClient'
import type { GitAdapter } from '../adapters/git'
import type { TrackedBranchDefinition } from '../services/TrackedBranchRegistry'
import {
  DEFAULT_CONNECTION_TIMEOUT_MS,
  DEFAULT_SERVER_PORT,
  DEFAULT_UPDATE_TIMEOUT_MS
} from '../shared/constants'
import { ConfigurationError, ValidationError } from '../shared/errors'

// ============================================================================
// Notifier configuration
// ============================================================================

export const GIT_CONFIG_SECTION = 'tracker.'

/** Where each option may be set, besides its command-line flag */
export const OPTION_SOURCES = {
  serviceUrl: { env: 'TRACKER_URL', git: 'tracker.url' },
  repository: { env: 'TRACKER_REPOSITORY', git: 'tracker.repository' },
  repositoryPrefix: { env: 'TRACKER_REPOSITORY_PREFIX', git: 'tracker.repositoryprefix' },
  connectionTimeout: { env: 'TRACKER_CONNECTION_TIMEOUT', git: 'tracker.connectiontimeout' },
  updateTimeout: { env: 'TRACKER_UPDATE_TIMEOUT', git: 'tracker.updatetimeout' },
  sendUsernames: { env: 'TRACKER_SEND_USERNAMES', git: 'tracker.sendusernames' },
  username: { env: 'TRACKER_USERNAME', git: 'tracker.username' },
  password: { env: 'TRACKER_PASSWORD', git: 'tracker.password' },
  contactAddress: { env: 'TRACKER_CONTACT', git: 'tracker.contact' },
  debug: { env: 'TRACKER_DEBUG', git: 'tracker.debug' },
  continueOnFailure: { env: 'TRACKER_CONTINUE_ON_FAILURE', git: 'tracker.continueonfailure' },
  insecure: { env: 'TRACKER_INSECURE', git: 'tracker.insecure' },
  disableRemoteTransform: {
    env: 'TRACKER_DISABLE_REMOTE_TRANSFORM',
    git: 'tracker.disableremotetransform'
  }
} as const

export type OptionName = keyof typeof OPTION_SOURCES

export type ConfigFlags = Partial<Record<OptionName, string | number | boolean | undefined>>

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1'])
const FALSE_WORDS = new Set(['false', 'no', 'off', '0', ''])

const booleanOption = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((value, ctx) => {
    if (value === undefined) return false
    if (typeof value === 'boolean') return value

    const word = value.trim().toLowerCase()
    if (TRUE_WORDS.has(word)) return true
    if (FALSE_WORDS.has(word)) return false

    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` })
    return z.NEVER
  })

/** Seconds in, milliseconds out */
function secondsOption(defaultMs: number) {
  return z
    .union([z.number(), z.string()])
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === '') return defaultMs

      const seconds = typeof value === 'number' ? value : Number(value.trim())
      if (!Number.isFinite(seconds) || seconds <= 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected a positive number of seconds, got "${value}"`
        })
        return z.NEVER
      }
      return seconds * 1000
    })
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value))

const rawConfigurationSchema = z.object({
  serviceUrl: z
    .string({ required_error: 'No tracker URL configured' })
    .url('Tracker URL is not a valid URL'),
  repository: optionalText,
  repositoryPrefix: optionalText,
  connectionTimeout: secondsOption(DEFAULT_CONNECTION_TIMEOUT_MS),
  updateTimeout: secondsOption(DEFAULT_UPDATE_TIMEOUT_MS),
  sendUsernames: booleanOption,
  username: optionalText,
  password: optionalText,
  contactAddress: optionalText,
  debug: booleanOption,
  continueOnFailure: booleanOption,
  insecure: booleanOption,
  disableRemoteTransform: booleanOption
})

export type NotifierConfiguration = {
  serviceUrl: string
  repository: string
  connectionTimeoutMs: number
  updateTimeoutMs: number
  sendUsernames: boolean
  credentials?: Credentials
  contactAddress?: string
  debug: boolean
  continueOnFailure: boolean
  insecure: boolean
  disableRemoteTransform: boolean
}

export type ConfigurationSources = {
  flags?: ConfigFlags
  env?: NodeJS.ProcessEnv
  /** `tracker.*` git config values, keyed as git reports them */
  settings?: Record<string, string>
  /** Repository the notifier runs in, joined with the repository prefix */
  repoPath: string
}

function pickRaw(sources: ConfigurationSources): Record<OptionName, unknown> {
  const { flags = {}, env = {}, settings = {} } = sources
  const pick = (name: OptionName): unknown => {
    const where = OPTION_SOURCES[name]
    return flags[name] ?? env[where.env] ?? settings[where.git]
  }

  return {
    serviceUrl: pick('serviceUrl'),
    repository: pick('repository'),
    repositoryPrefix: pick('repositoryPrefix'),
    connectionTimeout: pick('connectionTimeout'),
    updateTimeout: pick('updateTimeout'),
    sendUsernames: pick('sendUsernames'),
    username: pick('username'),
    password: pick('password'),
    contactAddress: pick('contactAddress'),
    debug: pick('debug'),
    continueOnFailure: pick('continueOnFailure'),
    insecure: pick('insecure'),
    disableRemoteTransform: pick('disableRemoteTransform')
  }
}

export function resolveConfiguration(sources: ConfigurationSources): NotifierConfiguration {
  const parsed = rawConfigurationSchema.safeParse(pickRaw(sources))
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue.path.join('.')
    throw new ConfigurationError(`Invalid ${field}: ${issue.message}`, field)
  }

  const raw = parsed.data

  let repository = raw.repository
  if (repository === undefined && raw.repositoryPrefix !== undefined) {
    repository = `${raw.repositoryPrefix}${sources.repoPath}`
  }
  if (repository === undefined) {
    throw new ConfigurationError(
      'No repository locator configured (set tracker.repository or tracker.repositoryPrefix)',
      'repository'
    )
  }

  return {
    serviceUrl: raw.serviceUrl,
    repository,
    connectionTimeoutMs: raw.connectionTimeout,
    updateTimeoutMs: raw.updateTimeout,
    sendUsernames: raw.sendUsernames,
    credentials:
      raw.username !== undefined && raw.password !== undefined
        ? { username: raw.username, password: raw.password }
        : undefined,
    contactAddress: raw.contactAddress,
    debug: raw.debug,
    continueOnFailure: raw.continueOnFailure,
    insecure: raw.insecure,
    disableRemoteTransform: raw.disableRemoteTransform
  }
}

/**
 * Reads the repository's `tracker.*` git config keys.
 */
export async function loadGitSettings(
  git: GitAdapter,
  repoPath: string
): Promise<Record<string, string>> {
  return git.listConfig(repoPath, GIT_CONFIG_SECTION)
}

// ============================================================================
// Endpoint configuration
// ============================================================================

const serverConfigurationSchema = z.object({
  TRACKER_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_SERVER_PORT),
  TRACKER_BRANCHES_FILE: z.string({ required_error: 'TRACKER_BRANCHES_FILE is not set' }).min(1),
  TRACKER_REPOSITORY_PATH: z.string().min(1).optional()
})

export type ServerConfiguration = {
  port: number
  branchesFile: string
  repositoryPath: string
}

export function loadServerConfiguration(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd()
): ServerConfiguration {
  const parsed = serverConfigurationSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue.path.join('.')
    throw new ConfigurationError(`Invalid ${field}: ${issue.message}`, field)
  }

  return {
    port: parsed.data.TRACKER_PORT,
    branchesFile: parsed.data.TRACKER_BRANCHES_FILE,
    repositoryPath: parsed.data.TRACKER_REPOSITORY_PATH ?? cwd
  }
}

const trackedBranchDefinitionSchema = z.object({
  remote: z.string().min(1),
  name: z.string().min(1),
  branch: z.string().min(1),
  review: z.object({ id: z.number().int(), summary: z.string() }).optional(),
  disabled: z.boolean().optional()
})

const trackedBranchesFileSchema = z.array(trackedBranchDefinitionSchema)

/**
 * Reads the JSON list of branches the endpoint tracks.
 */
export async function loadTrackedBranches(file: string): Promise<TrackedBranchDefinition[]> {
  let data: unknown
  try {
    data = JSON.parse(await fs.readFile(file, 'utf-8'))
  } catch (error) {
    throw new ValidationError(
      `Could not read tracked branches from ${file}: ${error instanceof Error ? error.message : String(error)}`,
      'file'
    )
  }

  const parsed = trackedBranchesFileSchema.safeParse(data)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ValidationError(
      `Invalid tracked branch at ${issue.path.join('.')}: ${issue.message}`,
      issue.path.join('.')
    )
  }

  return parsed.data
}
