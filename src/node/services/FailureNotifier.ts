/**
 * Out-of-band delivery of failure reports.
 *
 * Delivery is best-effort: `notifyFailure` logs a failed delivery and
 * returns, so a broken mail setup never masks the original failure.
 */

import { log } from '@shared/logger'
import { spawn } from 'child_process'
import os from 'os'

export interface FailureNotifier {
  notify(summary: string, body: string): Promise<void>
}

export type SendmailNotifierOptions = {
  recipient: string
  sender?: string
  sendmailPath?: string
}

/**
 * Pipes a plain-text message to `sendmail -t`.
 */
export class SendmailNotifier implements FailureNotifier {
  private readonly recipient: string
  private readonly sender: string
  private readonly sendmailPath: string

  constructor(options: SendmailNotifierOptions) {
    this.recipient = options.recipient
    this.sender = options.sender ?? `tracker@${os.hostname()}`
    this.sendmailPath = options.sendmailPath ?? '/usr/sbin/sendmail'
  }

  buildMessage(summary: string, body: string): string {
    return [
      `From: ${this.sender}`,
      `To: ${this.recipient}`,
      `Subject: ${summary}`,
      'Content-Type: text/plain; charset=utf-8',
      '',
      body,
      ''
    ].join('\n')
  }

  notify(summary: string, body: string): Promise<void> {
    const message = this.buildMessage(summary, body)

    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.sendmailPath, ['-t'], { stdio: ['pipe', 'ignore', 'pipe'] })
      let stderr = ''

      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString()
      })
      child.on('error', reject)
      child.stdin.on('error', reject)
      child.on('close', (code) => {
        if (code === 0) {
          resolve()
        } else {
          reject(new Error(`sendmail exited with code ${code}: ${stderr.trim()}`))
        }
      })

      child.stdin.end(message)
    })
  }
}

/**
 * Sends a failure report, logging instead of throwing when delivery fails.
 *
 * @returns true if the notifier accepted the report
 */
export async function notifyFailure(
  notifier: FailureNotifier,
  summary: string,
  body: string
): Promise<boolean> {
  try {
    await notifier.notify(summary, body)
    return true
  } catch (error) {
    log.warn('[FailureNotifier] Could not deliver failure report:', error)
    return false
  }
}
