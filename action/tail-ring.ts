import { Writable } from 'stream'

/**
 * Keeps the last `limit` bytes written to it. Used to hold the tail of a
 * child process's output for error reports without buffering all of it.
 */
export class TailRing {
  private chunks: Buffer[] = []
  private size = 0

  constructor(private readonly limit: number) {}

  static kb(kb: number): TailRing {
    return new TailRing(kb * 1024)
  }

  private trimToLimit() {
    while (this.chunks.length > 1 && this.size - this.chunks[0].length >= this.limit) {
      const removed = this.chunks.shift()
      if (!removed) break
      this.size -= removed.length
    }
    // Cut into the oldest chunk so exactly `limit` bytes remain.
    const excess = this.size - this.limit
    if (excess > 0) {
      this.chunks[0] = this.chunks[0].subarray(excess)
      this.size = this.limit
    }
  }

  write(chunk: string | Uint8Array): number {
    const buf = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk)
    if (this.limit <= 0 || buf.length === 0) return buf.length
    if (buf.length >= this.limit) {
      this.chunks = [buf.subarray(buf.length - this.limit)]
      this.size = this.limit
      return buf.length
    }
    this.chunks.push(buf)
    this.size += buf.length
    this.trimToLimit()
    return buf.length
  }

  bytes(): Buffer {
    return Buffer.concat(this.chunks, this.size)
  }

  toString(): string {
    return this.bytes().toString('utf8')
  }

  reset() {
    this.chunks = []
    this.size = 0
  }

  get length(): number {
    return this.size
  }

  get capacity(): number {
    return this.limit
  }
}

/** A stream that feeds `ring` and, when given, `destination` as well. */
export function tee(destination: NodeJS.WritableStream | undefined, ring: TailRing): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      ring.write(chunk)
      if (!destination) {
        callback()
        return
      }
      destination.write(chunk, (err) => callback(err ?? null))
    },
  })
}
