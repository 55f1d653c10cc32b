import { serve } from '@hono/node-server'
import dotenv from 'dotenv'
import { log } from '@shared/logger'
import { createGitFetchJob, getGitAdapter } from './adapters/git'
import { loadServerConfiguration, loadTrackedBranches } from './core/config'
import { createTrackerApp } from './handlers'
import { TrackedBranchRegistry } from './services/TrackedBranchRegistry'
import { JobQueueScheduler } from './services/UpdateScheduler'

dotenv.config()

async function main(): Promise<void> {
  const config = loadServerConfiguration(process.env)

  const registry = new TrackedBranchRegistry()
  for (const definition of await loadTrackedBranches(config.branchesFile)) {
    const branch = registry.register(definition)
    log.info(`[server] Tracking ${branch.remote} ${branch.name} -> ${branch.branch}`)
  }

  const scheduler = new JobQueueScheduler(
    registry,
    createGitFetchJob(getGitAdapter(), config.repositoryPath)
  )
  registry.setScheduler(scheduler)

  const server = serve({ fetch: createTrackerApp(registry).fetch, port: config.port }, (info) => {
    log.info(`[server] Listening on port ${info.port}`)
  })

  const shutdown = (): void => {
    log.info('[server] Shutting down; waiting for running updates')
    server.close()
    scheduler
      .idle()
      .then(() => process.exit(0))
      .catch((error) => {
        log.error('[server] Failed while draining updates:', error)
        process.exit(1)
      })
  }

  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

main().catch((error) => {
  log.error('[server] Failed to start:', error)
  process.exitCode = 1
})
