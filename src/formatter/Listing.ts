import type { Bitness, Instruction } from '../decoder/types'
import { formatInstruction } from './Formatter'
import type { Syntax } from './Formatter'

export interface ListingOptions {
  syntax?: Syntax
  limit?: number
}

// Seven bytes fit; longer encodings push the text column right.
export const HEX_COLUMN_WIDTH = 20

export const formatAddress = (address: bigint, bitness: Bitness): string =>
  address.toString(16).padStart(bitness === 64 ? 16 : 8, '0')

export const formatListingLine = (instruction: Instruction, syntax: Syntax = 'intel'): string => {
  const { text, hex } = formatInstruction(instruction, syntax)
  return `${formatAddress(instruction.address, instruction.bitness)}  ${hex.padEnd(HEX_COLUMN_WIDTH)}  ${text}`
}

// `address  hex  text` lines, stopping after `limit` instructions when given.
export const formatListing = (instructions: Iterable<Instruction>, options: ListingOptions = {}): string[] => {
  const lines: string[] = []
  for (const instruction of instructions) {
    if (options.limit !== undefined && lines.length >= options.limit) break
    lines.push(formatListingLine(instruction, options.syntax))
  }
  return lines
}

export interface ListingStats {
  instructions: number
  invalid: number
  bytes: number
}

export const listingStats = (instructions: Iterable<Instruction>): ListingStats => {
  const stats: ListingStats = { instructions: 0, invalid: 0, bytes: 0 }
  for (const instruction of instructions) {
    stats.instructions++
    if (!instruction.valid) stats.invalid++
    stats.bytes += instruction.length
  }
  return stats
}
