import type { Bitness, PrefixState, SegmentName } from './types'

// 15-byte instruction ceiling leaves room for at most 14 prefixes.
export const MAX_LEGACY_PREFIXES = 14

const SEGMENT_OVERRIDES: Partial<Record<number, SegmentName>> = {
  0x26: 'es',
  0x2E: 'cs',
  0x36: 'ss',
  0x3E: 'ds',
  0x64: 'fs',
  0x65: 'gs',
}

export const emptyPrefixState = (): PrefixState => ({
  lock: false,
  repeat: null,
  segment: null,
  operandSize: false,
  addressSize: false,
  rex: null,
  count: 0,
})

export interface PrefixScan {
  prefixes: PrefixState
  cursor: number
}

// Legacy prefixes first, then at most one REX byte in 64-bit mode. A legacy
// prefix after REX is left for the opcode reader.
export const scanPrefixes = (buffer: Uint8Array, cursor: number, bitness: Bitness): PrefixScan => {
  const prefixes = emptyPrefixState()
  let position = cursor

  while (position < buffer.length && prefixes.count < MAX_LEGACY_PREFIXES) {
    const byte = buffer[position]
    const segment = SEGMENT_OVERRIDES[byte]
    if (segment !== undefined) prefixes.segment = segment
    else if (byte === 0x66) prefixes.operandSize = true
    else if (byte === 0x67) prefixes.addressSize = true
    else if (byte === 0xF0) prefixes.lock = true
    else if (byte === 0xF2) prefixes.repeat = 'repne'
    else if (byte === 0xF3) prefixes.repeat = 'rep'
    else break

    prefixes.count++
    position++
  }

  if (bitness === 64 && position < buffer.length && (buffer[position] & 0xF0) === 0x40) {
    const rex = buffer[position]
    prefixes.rex = {
      w: (rex & 0x08) !== 0,
      r: (rex & 0x04) !== 0,
      x: (rex & 0x02) !== 0,
      b: (rex & 0x01) !== 0,
    }
    position++
  }

  return { prefixes, cursor: position }
}
