#!/usr/bin/env node
import dotenv from 'dotenv'
import meow from 'meow'
import os from 'os'
import { log } from '@shared/logger'
import type { ConfigFlags } from './core/config'
import { EXIT_FAILURE, HookRunOperation } from './operations/HookRunOperation'

dotenv.config()

const cli = meow(
  `
	Usage
	  $ tracker-notify [<ref>[=<sha>] ...]

	Without refs, reads "<old> <new> <ref>" lines from stdin, as a
	post-receive hook gets them.

	Options
	  --url                       Base URL of the tracking service
	  --repository                Remote locator of this repository
	  --repository-prefix         Prefix joined with the repository path
	  --connection-timeout        Seconds to wait for the service (default 5)
	  --update-timeout            Seconds to wait for an update (default 30)
	  --send-usernames            Send the local user name
	  --username, --password      HTTP Basic credentials
	  --contact                   Mail failure reports to this address
	  --debug                     Print requests and replies
	  --continue-on-failure       Keep going after a failed ref
	  --insecure                  Skip TLS certificate checks
	  --disable-remote-transform  Send the repository locator as-is
	  --repo-path                 Repository to read git config from (default cwd)

	Each option can also be set as TRACKER_<NAME> in the environment or as
	tracker.<name> in git config.

	Examples
	  $ tracker-notify refs/heads/main
	  $ tracker-notify --debug main=0123456789abcdef0123456789abcdef01234567
`,
  {
    importMeta: import.meta,
    booleanDefault: undefined,
    flags: {
      url: { type: 'string' },
      repository: { type: 'string' },
      repositoryPrefix: { type: 'string' },
      connectionTimeout: { type: 'number' },
      updateTimeout: { type: 'number' },
      sendUsernames: { type: 'boolean' },
      username: { type: 'string' },
      password: { type: 'string' },
      contact: { type: 'string' },
      debug: { type: 'boolean' },
      continueOnFailure: { type: 'boolean' },
      insecure: { type: 'boolean' },
      disableRemoteTransform: { type: 'boolean' },
      repoPath: { type: 'string' }
    }
  }
)

const flags: ConfigFlags = {
  serviceUrl: cli.flags.url,
  repository: cli.flags.repository,
  repositoryPrefix: cli.flags.repositoryPrefix,
  connectionTimeout: cli.flags.connectionTimeout,
  updateTimeout: cli.flags.updateTimeout,
  sendUsernames: cli.flags.sendUsernames,
  username: cli.flags.username,
  password: cli.flags.password,
  contactAddress: cli.flags.contact,
  debug: cli.flags.debug,
  continueOnFailure: cli.flags.continueOnFailure,
  insecure: cli.flags.insecure,
  disableRemoteTransform: cli.flags.disableRemoteTransform
}

HookRunOperation.run({
  argv: process.argv.slice(2),
  refs: cli.input,
  flags,
  env: process.env,
  repoPath: cli.flags.repoPath ?? process.cwd(),
  username: os.userInfo().username,
  stdin: process.stdin
})
  .then((code) => {
    process.exitCode = code
  })
  .catch((error) => {
    log.error('[cli] Unexpected failure:', error)
    process.exitCode = EXIT_FAILURE
  })
