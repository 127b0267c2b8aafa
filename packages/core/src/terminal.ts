/**
 * Terminal helpers for the CLI prompts.
 */

import type * as readline from 'node:readline/promises'
import { Writable } from 'node:stream'

/**
 * readline output that forwards to a target stream unless muted. Echo of
 * typed characters goes through it, so muting hides a secret being typed.
 */
export class MutableOutput extends Writable {
  muted = false

  constructor(private target: NodeJS.WritableStream) {
    super()
  }

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    if (!this.muted) {
      this.target.write(chunk)
    }
    callback()
  }
}

/**
 * Ask a question without echoing the answer. The prompt itself is shown.
 */
export async function askSecret(
  rl: readline.Interface,
  output: MutableOutput,
  prompt: string,
): Promise<string> {
  const answer = rl.question(prompt)
  output.muted = true
  try {
    return (await answer).trim()
  } finally {
    output.muted = false
    output.write('\n')
  }
}
