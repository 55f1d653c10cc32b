/**
 * HookRunOperation - One invocation of the notifier from a git hook
 *
 * Resolves configuration, collects the updated refs (named on the command
 * line, or read from the hook's stdin), notifies the tracking service, and
 * mails the transcript to the contact address if anything fatal happened.
 */

import { log, setLogLevel } from '@shared/logger'
import type { Readable } from 'stream'
import type { RefChange } from '@shared/types'
import { getGitAdapter, readRefChanges, resolveRefChange, type GitAdapter } from '../adapters/git'
import {
  UpdateRequestClient,
  type UpdateSender
} from '../adapters/tracker/UpdateRequestClient'
import {
  loadGitSettings,
  resolveConfiguration,
  type ConfigFlags,
  type NotifierConfiguration
} from '../core/config'
import { notifyFailure, SendmailNotifier, type FailureNotifier } from '../services/FailureNotifier'
import { ProgressLog, type LineWriter } from '../services/ProgressLog'
import { ConfigurationError } from '../shared/errors'
import { NotifyOperation, type Clock } from './NotifyOperation'

export type HookRunInput = {
  /** Raw command-line arguments, recorded in the transcript */
  argv: string[]
  /** Refs named on the command line, as `<ref>` or `<ref>=<sha>` */
  refs: string[]
  flags: ConfigFlags
  env: NodeJS.ProcessEnv
  repoPath: string
  /** Local user running the hook */
  username: string
  stdin: Readable
}

export type ClosableSender = UpdateSender & { close?: () => Promise<void> }

export type HookRunDependencies = {
  git?: GitAdapter
  createSender?: (config: NotifierConfiguration) => ClosableSender
  createNotifier?: (recipient: string) => FailureNotifier
  write?: LineWriter
  clock?: Clock
}

export const EXIT_OK = 0
export const EXIT_FAILURE = 1

function defaultSender(config: NotifierConfiguration): ClosableSender {
  return new UpdateRequestClient({
    serviceUrl: config.serviceUrl,
    credentials: config.credentials,
    insecure: config.insecure
  })
}

function defaultNotifier(recipient: string): FailureNotifier {
  return new SendmailNotifier({ recipient })
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class HookRunOperation {
  /**
   * Runs the notifier and returns the process exit code.
   */
  static async run(input: HookRunInput, deps: HookRunDependencies = {}): Promise<number> {
    const git = deps.git ?? getGitAdapter()
    const progress = new ProgressLog({
      write: deps.write,
      header: [
        `User: ${input.username}`,
        `Path: ${input.repoPath}`,
        `Args: ${input.argv.join(' ')}`,
        ''
      ]
    })

    const settings = await loadGitSettings(git, input.repoPath).catch(
      (error: unknown): Record<string, string> => {
        log.warn('[HookRunOperation] Could not read git config; using flags and environment:', error)
        return {}
      }
    )

    let config: NotifierConfiguration
    try {
      config = resolveConfiguration({
        flags: input.flags,
        env: input.env,
        settings,
        repoPath: input.repoPath
      })
    } catch (error) {
      if (error instanceof ConfigurationError) {
        progress.error(error.message)
        return EXIT_FAILURE
      }
      throw error
    }

    progress.setDebug(config.debug)
    if (config.debug) {
      setLogLevel('debug')
    }

    const sender = (deps.createSender ?? defaultSender)(config)
    const operation = new NotifyOperation(
      { sender, progress, clock: deps.clock },
      {
        repository: config.repository,
        connectionTimeoutMs: config.connectionTimeoutMs,
        updateTimeoutMs: config.updateTimeoutMs,
        username: config.sendUsernames ? input.username : undefined,
        disableRemoteTransform: config.disableRemoteTransform,
        continueOnFailure: config.continueOnFailure
      }
    )

    let failed: boolean
    try {
      const changes =
        input.refs.length > 0
          ? HookRunOperation.namedRefs(git, input.repoPath, input.refs)
          : readRefChanges(input.stdin)
      const result = await operation.notifyAll(changes)
      failed = result.failures.length > 0
    } catch (error) {
      // Malformed hook input ends the batch
      progress.error(errorMessage(error))
      failed = true
    } finally {
      await sender.close?.()
    }

    if (!failed) {
      return EXIT_OK
    }

    if (config.contactAddress) {
      const notifier = (deps.createNotifier ?? defaultNotifier)(config.contactAddress)
      await notifyFailure(
        notifier,
        `Tracked branch notification failed in ${input.repoPath}`,
        progress.text()
      )
    }

    return EXIT_FAILURE
  }

  /**
   * Yields changes for refs named on the command line, resolving lazily so
   * an aborted batch never touches later refs.
   */
  static async *namedRefs(
    git: GitAdapter,
    repoPath: string,
    specs: string[]
  ): AsyncGenerator<RefChange> {
    for (const spec of specs) {
      const separator = spec.indexOf('=')
      if (separator === -1) {
        yield await resolveRefChange(git, repoPath, spec)
      } else {
        yield await resolveRefChange(
          git,
          repoPath,
          spec.slice(0, separator),
          spec.slice(separator + 1)
        )
      }
    }
  }
}
