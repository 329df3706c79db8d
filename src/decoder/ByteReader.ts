import { NotEnoughBytesError } from './errors'

// Little-endian reader over buffer[start, limit). Reading past the limit
// throws NotEnoughBytesError instead of returning undefined bytes.
export class ByteReader {
  readonly start: number
  private buffer: Uint8Array
  private limit: number
  private position: number

  constructor(buffer: Uint8Array, start: number, limit: number) {
    this.buffer = buffer
    this.start = start
    this.limit = limit
    this.position = start
  }

  get offset(): number {
    return this.position
  }

  get remaining(): number {
    return this.limit - this.position
  }

  private take(count: number): number {
    if (this.position + count > this.limit) {
      throw new NotEnoughBytesError(this.remaining, count)
    }
    const at = this.position
    this.position += count
    return at
  }

  u8(): number {
    return this.buffer[this.take(1)]
  }

  u16(): number {
    const at = this.take(2)
    return this.buffer[at] | (this.buffer[at + 1] << 8)
  }

  u32(): number {
    const at = this.take(4)
    return (
      this.buffer[at] |
      (this.buffer[at + 1] << 8) |
      (this.buffer[at + 2] << 16) |
      (this.buffer[at + 3] << 24)
    ) >>> 0
  }

  // Unsigned value `width` bits wide.
  unsigned(width: 8 | 16 | 32 | 64): bigint {
    switch (width) {
      case 8: return BigInt(this.u8())
      case 16: return BigInt(this.u16())
      case 32: return BigInt(this.u32())
      case 64: {
        const low = BigInt(this.u32())
        const high = BigInt(this.u32())
        return (high << 32n) | low
      }
    }
  }

  // Two's-complement value `width` bits wide.
  signed(width: 8 | 16 | 32 | 64): bigint {
    return BigInt.asIntN(width, this.unsigned(width))
  }
}
