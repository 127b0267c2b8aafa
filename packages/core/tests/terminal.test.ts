/**
 * CLI terminal helper tests
 */

import { describe, it, expect } from 'vitest'
import * as readline from 'node:readline/promises'
import { PassThrough, Writable } from 'node:stream'
import { MutableOutput, askSecret } from '../src/terminal.js'
import { findSource } from '../src/sources/index.js'

function recorder(): { target: Writable; written: () => string } {
  const chunks: string[] = []
  const target = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf-8'))
      callback()
    },
  })
  return { target, written: () => chunks.join('') }
}

describe('MutableOutput', () => {
  it('drops writes while muted', () => {
    const { target, written } = recorder()
    const output = new MutableOutput(target)

    output.write('a')
    output.muted = true
    output.write('b')
    output.muted = false
    output.write('c')

    expect(written()).toBe('ac')
  })
})

describe('askSecret', () => {
  it('shows the prompt but not the typed answer', async () => {
    const input = new PassThrough()
    const { target, written } = recorder()
    const output = new MutableOutput(target)
    const rl = readline.createInterface({ input, output, terminal: true })

    try {
      const answer = askSecret(rl, output, 'Password: ')
      input.write('test-secret\r')

      expect(await answer).toBe('test-secret')
      expect(written()).toContain('Password: ')
      expect(written()).not.toContain('test-secret')
    } finally {
      rl.close()
    }
  })
})

describe('findSource', () => {
  it('matches ids and display names ignoring case', () => {
    expect(findSource('sgu')?.id).toBe('sgu')
    expect(findSource('HUFLIT')?.id).toBe('huflit')
    expect(findSource(' Sgu ')?.displayName).toBe('SGU')
  })

  it('returns undefined for an unknown school', () => {
    expect(findSource('mit')).toBeUndefined()
  })
})
