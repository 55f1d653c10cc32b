import { beforeEach, describe, expect, it } from 'vitest'
import { ProgressLog } from '../ProgressLog'

describe('ProgressLog', () => {
  let printed: string[]
  let progress: ProgressLog

  beforeEach(() => {
    printed = []
    progress = new ProgressLog({
      write: (line) => printed.push(line),
      header: ['User: alice', '']
    })
  })

  it('prefixes each line of a progress message', () => {
    progress.progress('first\nsecond')

    expect(printed).toEqual(['[tracker] first', '[tracker] second'])
  })

  it('drops a single trailing newline', () => {
    progress.progress('done\n')

    expect(printed).toEqual(['[tracker] done'])
  })

  it('records debug lines without printing them unless enabled', () => {
    progress.debug('quiet')
    progress.setDebug(true)
    progress.debug('loud')

    expect(printed).toEqual(['[tracker:debug] loud'])
    expect(progress.text()).toBe('User: alice\n\n[tracker:debug] quiet\n[tracker:debug] loud')
  })

  it('prints errors with their own prefix', () => {
    progress.error('Tracker rejected the update!')

    expect(printed).toEqual(['[tracker:error] Tracker rejected the update!'])
  })

  it('dumps JSON with sorted keys', () => {
    progress.setDebug(true)
    progress.debugJson({ value: 'x', review: { summary: 's', id: 1 } })

    expect(printed).toEqual([
      '[tracker:debug] {',
      '[tracker:debug]     "review": {',
      '[tracker:debug]         "id": 1,',
      '[tracker:debug]         "summary": "s"',
      '[tracker:debug]     },',
      '[tracker:debug]     "value": "x"',
      '[tracker:debug] }'
    ])
  })

  it('frames hook output with rules', () => {
    const rule = '-'.repeat(60)

    progress.hook('Updated r/alice/proj\n')

    expect(printed).toEqual([
      `[tracker] ${rule}`,
      '[tracker] Updated r/alice/proj',
      `[tracker] ${rule}`
    ])
  })
})
