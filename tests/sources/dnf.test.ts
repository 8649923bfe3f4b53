import { describe, it, expect, vi } from 'vitest'
import { DnfSource, parseDnfOutput } from '../../src/sources/dnf.js'
import type { CommandRunner } from '../../src/sources/command.js'

const signal = new AbortController().signal

const SAMPLE = [
  'Last metadata expiration check: 0:12:01 ago on Mon 01 Jan 2024.',
  '======================== Name Exactly Matched: firefox ========================',
  'firefox.x86_64 : Mozilla Firefox Web browser',
  '======================= Name & Summary Matched: firefox ========================',
  'firefox-langpacks.x86_64 : Firefox langpacks',
  'python3-firefox.data.noarch : Test data',
  '',
].join('\n')

function source(exitCode: number, stdout = '', stderr = ''): DnfSource {
  return new DnfSource(1_000, vi.fn<CommandRunner>().mockResolvedValue({ exitCode, stdout, stderr }))
}

describe('parseDnfOutput', () => {
  it('reads name.arch rows after the section headers', () => {
    expect(parseDnfOutput(SAMPLE)).toEqual([
      { name: 'firefox', description: 'Mozilla Firefox Web browser', source: 'dnf' },
      { name: 'firefox-langpacks', description: 'Firefox langpacks', source: 'dnf' },
      { name: 'python3-firefox.data', description: 'Test data', source: 'dnf' },
    ])
  })

  it('ignores rows before any header', () => {
    expect(parseDnfOutput('stray.x86_64 : not a result\n')).toEqual([])
  })
})

describe('DnfSource', () => {
  it('maps exit codes and stderr', async () => {
    expect(await source(0, SAMPLE).query('firefox', signal)).toMatchObject({ status: 'ok' })
    expect(await source(1).query('zzz', signal)).toEqual({ status: 'ok', records: [] })
    expect(await source(2, '', 'Permission denied').query('x', signal)).toMatchObject({ kind: 'permission' })
    expect(await source(2, '', 'Cannot retrieve metalink for repository').query('x', signal)).toMatchObject({
      kind: 'network',
    })
    expect(await source(2, '', 'Cache disabled').query('x', signal)).toEqual({
      status: 'failed',
      kind: 'generic',
      message: 'DNF cache is disabled. Try: sudo dnf makecache',
    })
  })
})
