import type { Writable } from 'node:stream'
import { ExecutionError } from '@querydiff/model'

function outputClosed(): ExecutionError {
  return new ExecutionError({ code: 'QUERY_FAILED', operation: 'write' }, 'Output closed before encoding finished')
}

/**
 * Writes one chunk, waiting for `drain` when the destination is full.
 * Rejects if the destination closes or errors while waiting.
 */
export function writeChunk(out: Writable, chunk: string): Promise<void> {
  if (out.destroyed || out.writableEnded) return Promise.reject(outputClosed())
  if (out.write(chunk)) return Promise.resolve()

  return new Promise<void>((resolve, reject) => {
    const cleanup = (): void => {
      out.off('drain', onDrain)
      out.off('close', onClose)
      out.off('error', onError)
    }
    const onDrain = (): void => {
      cleanup()
      resolve()
    }
    const onClose = (): void => {
      cleanup()
      reject(outputClosed())
    }
    const onError = (err: Error): void => {
      cleanup()
      reject(err)
    }
    out.on('drain', onDrain)
    out.on('close', onClose)
    out.on('error', onError)
  })
}
