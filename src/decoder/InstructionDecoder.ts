import type {
  Bitness,
  EscapeMap,
  Instruction,
  MandatoryPrefix,
  Operand,
  PrefixState,
  RelativeOperand,
  TemplateFlags,
} from './types'
import { ByteReader } from './ByteReader'
import { DecoderConfigError, InvalidEncodingError, NotEnoughBytesError } from './errors'
import { resolveOpcode } from './OpcodeTable'
import { decodeOperands } from './OperandDecoder'
import type { OperandWidth } from './OperandDecoder'
import { scanPrefixes } from './PrefixScanner'

export const MAX_INSTRUCTION_LENGTH = 15

export interface DecodeOptions {
  bitness: number
  baseAddress?: bigint | number
}

export interface DecodeContext {
  readonly bitness: Bitness
  readonly baseAddress: bigint
}

export const isBitness = (value: number): value is Bitness =>
  value === 16 || value === 32 || value === 64

export const createDecodeContext = (options: DecodeOptions): DecodeContext => {
  if (!isBitness(options.bitness)) {
    throw new DecoderConfigError(`unsupported bitness ${options.bitness}; expected 16, 32 or 64`)
  }
  const base = options.baseAddress ?? 0n
  if (typeof base === 'number' && (!Number.isSafeInteger(base) || base < 0)) {
    throw new DecoderConfigError(`base address must be a non-negative integer, got ${base}`)
  }
  const baseAddress = BigInt(base)
  if (baseAddress < 0n) {
    throw new DecoderConfigError(`base address must be a non-negative integer, got ${baseAddress}`)
  }
  return Object.freeze({ bitness: options.bitness, baseAddress })
}

const defaultOperandSize = (bitness: Bitness): OperandWidth => (bitness === 16 ? 16 : 32)

export const operandSizeFor = (
  bitness: Bitness,
  prefixes: PrefixState,
  flags: TemplateFlags,
  mandatoryPrefix: MandatoryPrefix | null,
): OperandWidth => {
  const override = prefixes.operandSize && mandatoryPrefix !== 0x66
  if (bitness === 64) {
    if (prefixes.rex?.w) return 64
    // AMD64 rule: 66 shortens near branches too, unlike Intel's fixed 64.
    if (override) return 16
    return flags.d64 || flags.f64 ? 64 : 32
  }
  if (bitness === 32) return override ? 16 : 32
  return override ? 32 : 16
}

export const addressSizeFor = (bitness: Bitness, prefixes: PrefixState): OperandWidth => {
  switch (bitness) {
    case 64: return prefixes.addressSize ? 32 : 64
    case 32: return prefixes.addressSize ? 16 : 32
    case 16: return prefixes.addressSize ? 32 : 16
  }
}

const invalidRecord = (
  buffer: Uint8Array,
  cursor: number,
  length: number,
  address: bigint,
  bitness: Bitness,
  prefixes: PrefixState,
): Instruction => ({
  address,
  length,
  mnemonic: 'INVALID',
  operands: [],
  prefixes,
  bytes: buffer.slice(cursor, cursor + length),
  valid: false,
  bitness,
  operandSize: defaultOperandSize(bitness),
  addressSize: addressSizeFor(bitness, prefixes),
  mandatoryPrefix: null,
})

const readOpcode = (reader: ByteReader): { map: EscapeMap; opcode: number } => {
  const first = reader.u8()
  if (first !== 0x0F) return { map: 'one-byte', opcode: first }
  const second = reader.u8()
  if (second === 0x38) return { map: '0f38', opcode: reader.u8() }
  if (second === 0x3A) return { map: '0f3a', opcode: reader.u8() }
  return { map: '0f', opcode: second }
}

const toHex = (value: number): string => value.toString(16).toUpperCase().padStart(2, '0')

// Decode the instruction at buffer[cursor]. Never throws for bad bytes:
// undefined opcodes and invalid encodings come back as INVALID records of the
// bytes read so far, truncated ones as INVALID records of the whole window.
export const decodeOne = (buffer: Uint8Array, cursor: number, address: bigint, bitness: Bitness): Instruction => {
  if (!Number.isInteger(cursor) || cursor < 0 || cursor >= buffer.length) {
    throw new DecoderConfigError(`cursor ${cursor} is outside a buffer of ${buffer.length} byte(s)`)
  }

  const windowEnd = Math.min(buffer.length, cursor + MAX_INSTRUCTION_LENGTH)
  const { prefixes, cursor: opcodeCursor } = scanPrefixes(buffer.subarray(0, windowEnd), cursor, bitness)
  const reader = new ByteReader(buffer, opcodeCursor, windowEnd)

  try {
    const { map, opcode } = readOpcode(reader)

    let modrm: number | null = null
    const readModRM = (): number => {
      if (modrm === null) modrm = reader.u8()
      return modrm
    }

    // 90 with REX.B is an exchange with r8, not NOP.
    const tableOpcode = map === 'one-byte' && opcode === 0x90 && prefixes.rex?.b ? 0x91 : opcode
    const resolved = resolveOpcode(map, tableOpcode, {
      bitness,
      rexW: prefixes.rex?.w ?? false,
      repeat: prefixes.repeat,
      operandSizePrefix: prefixes.operandSize,
      modrm: readModRM,
    })
    if (resolved === undefined) {
      throw new InvalidEncodingError(`undefined opcode ${map} ${toHex(opcode)}`)
    }

    const { template, mandatoryPrefix } = resolved
    if (template.flags.i64 && bitness === 64) {
      throw new InvalidEncodingError(`${template.mnemonic} is not encodable in 64-bit mode`)
    }
    if (template.flags.o64 && bitness !== 64) {
      throw new InvalidEncodingError(`${template.mnemonic} exists only in 64-bit mode`)
    }
    if (template.requiresModRM) readModRM()

    const operandSize = operandSizeFor(bitness, prefixes, template.flags, mandatoryPrefix)
    const addressSize = addressSizeFor(bitness, prefixes)
    const operands: Operand[] = decodeOperands(reader, template.operands, {
      bitness,
      prefixes,
      operandSize,
      addressSize,
      opcode,
      modrm,
    })

    const length = reader.offset - cursor
    return {
      address,
      length,
      mnemonic: template.byAddressSize[addressSize] ?? template.byOperandSize[operandSize] ?? template.mnemonic,
      operands,
      prefixes,
      bytes: buffer.slice(cursor, cursor + length),
      valid: true,
      bitness,
      operandSize,
      addressSize,
      mandatoryPrefix,
    }
  } catch (error) {
    if (error instanceof NotEnoughBytesError) {
      return invalidRecord(buffer, cursor, windowEnd - cursor, address, bitness, prefixes)
    }
    if (error instanceof InvalidEncodingError) {
      const consumed = Math.max(1, reader.offset - cursor)
      return invalidRecord(buffer, cursor, consumed, address, bitness, prefixes)
    }
    throw error
  }
}

export interface InstructionStream extends Iterable<Instruction> {
  readonly context: DecodeContext
  readonly byteLength: number
}

function* decodeAll(buffer: Uint8Array, context: DecodeContext): Generator<Instruction, void, undefined> {
  let cursor = 0
  let address = context.baseAddress
  while (cursor < buffer.length) {
    const instruction = decodeOne(buffer, cursor, address, context.bitness)
    yield instruction
    cursor += instruction.length
    address += BigInt(instruction.length)
  }
}

// Lazy listing of the whole buffer. Options are checked here, before any
// decoding; every iteration starts again at offset 0.
export const disassemble = (buffer: Uint8Array, options: DecodeOptions): InstructionStream => {
  if (buffer.length === 0) {
    throw new DecoderConfigError('cannot disassemble an empty buffer')
  }
  const context = createDecodeContext(options)
  return {
    context,
    byteLength: buffer.length,
    [Symbol.iterator]: () => decodeAll(buffer, context),
  }
}

export const disassembleAll = (buffer: Uint8Array, options: DecodeOptions): Instruction[] =>
  Array.from(disassemble(buffer, options))

const wrapAddress = (value: bigint, width: number): bigint => BigInt.asUintN(width, value)

const nextAddress = (instruction: Instruction): bigint => instruction.address + BigInt(instruction.length)

// Absolute address a memory operand refers to, when it does not depend on
// register contents.
export const effectiveAddress = (instruction: Instruction, operand: Operand): bigint | null => {
  if (operand.kind !== 'memory') return null
  if (operand.ripRelative) {
    return wrapAddress(nextAddress(instruction) + operand.displacement, operand.addressWidth)
  }
  if (operand.base === null && operand.index === null) {
    return wrapAddress(operand.displacement, operand.addressWidth)
  }
  return null
}

// Absolute target of a relative operand, wrapped to the instruction pointer
// width (IP under a 16-bit operand size).
export const relativeTarget = (instruction: Instruction, operand: RelativeOperand): bigint => {
  const width = instruction.bitness === 64 && instruction.operandSize !== 16 ? 64 : instruction.operandSize
  return wrapAddress(nextAddress(instruction) + BigInt(operand.displacement), width)
}

export const branchTarget = (instruction: Instruction): bigint | null => {
  for (const operand of instruction.operands) {
    if (operand.kind === 'relative') return relativeTarget(instruction, operand)
  }
  return null
}
