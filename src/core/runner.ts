import { spawn } from 'node:child_process'
import type { ProcessResult } from './types.js'

export interface RunOptions {
  timeoutMs?: number
}

export const DEFAULT_TIMEOUT_MS = 10_000
export const MAX_BUFFER_BYTES = 10 * 1024 * 1024 // 10 MB

/**
 * Run a command without a shell and collect its output.
 *
 * Resolves for any exit code; rejects only when the process could not be
 * spawned, ran past the timeout, or produced more output than the cap.
 */
export function runCommand(command: string[], options?: RunOptions): Promise<ProcessResult> {
  if (command.length === 0) {
    return Promise.reject(new Error('Command must not be empty'))
  }
  const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS

  return new Promise((resolve, reject) => {
    const [cmd, ...args] = command
    const child = spawn(cmd, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    let stdoutBytes = 0
    let stderrBytes = 0
    let timedOut = false
    let bufferExceeded = false

    const timer = setTimeout(() => {
      timedOut = true
      child.kill('SIGKILL')
    }, timeoutMs)

    child.stdout.on('data', (data: Buffer) => {
      stdoutBytes += data.length
      if (stdoutBytes > MAX_BUFFER_BYTES) {
        bufferExceeded = true
        child.kill('SIGKILL')
        return
      }
      stdout += data.toString()
    })

    child.stderr.on('data', (data: Buffer) => {
      stderrBytes += data.length
      if (stderrBytes > MAX_BUFFER_BYTES) {
        bufferExceeded = true
        child.kill('SIGKILL')
        return
      }
      stderr += data.toString()
    })

    child.on('error', (err: Error) => {
      clearTimeout(timer)
      reject(new Error(`Spawn failure: ${err.message}`))
    })

    child.on('close', (exitCode: number | null) => {
      clearTimeout(timer)
      if (timedOut) {
        reject(new Error(`Process timed out after ${String(timeoutMs)}ms: ${command.join(' ')}`))
      } else if (bufferExceeded) {
        reject(new Error(`Process killed: output exceeded ${String(MAX_BUFFER_BYTES)} byte buffer limit`))
      } else {
        resolve({ exitCode, stdout, stderr })
      }
    })
  })
}
