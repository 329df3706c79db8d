import type { Instruction, MemoryOperand, Operand } from '../decoder/types'
import { effectiveAddress, relativeTarget } from '../decoder/InstructionDecoder'

export type Syntax = 'intel' | 'att'

export const SYNTAXES: readonly Syntax[] = ['intel', 'att']

export const isSyntax = (value: string): value is Syntax =>
  SYNTAXES.some(syntax => syntax === value)

export interface FormattedInstruction {
  text: string
  hex: string
}

export const BAD_INSTRUCTION = '(bad)'

export const formatHex = (bytes: Uint8Array): string =>
  Array.from(bytes, byte => byte.toString(16).padStart(2, '0')).join(' ')

const hex = (value: bigint): string => `0x${value.toString(16)}`

const signedHex = (value: bigint): string => (value < 0n ? `-${hex(-value)}` : hex(value))

const unsignedAt = (value: bigint, width: number): bigint => BigInt.asUintN(width, value)

// Mnemonics that take repe rather than rep under F3.
const COMPARING_STRING_OPS = new Set(['CMPS', 'SCAS'])

const prefixWords = (instruction: Instruction): string[] => {
  const { prefixes, mandatoryPrefix } = instruction
  const words: string[] = []
  if (prefixes.lock) words.push('lock')
  if (prefixes.repeat === 'rep' && mandatoryPrefix !== 0xF3) {
    words.push(COMPARING_STRING_OPS.has(instruction.mnemonic) ? 'repe' : 'rep')
  }
  if (prefixes.repeat === 'repne' && mandatoryPrefix !== 0xF2) words.push('repne')
  return words
}

const ripComment = (instruction: Instruction): bigint | null => {
  for (const operand of instruction.operands) {
    if (operand.kind === 'memory' && operand.ripRelative) return effectiveAddress(instruction, operand)
  }
  return null
}

const ipName = (operand: MemoryOperand): string => (operand.addressWidth === 32 ? 'eip' : 'rip')

// Intel syntax

const SIZE_KEYWORDS: Partial<Record<number, string>> = {
  8: 'byte',
  16: 'word',
  32: 'dword',
  48: 'fword',
  64: 'qword',
  80: 'tbyte',
  128: 'xmmword',
}

const intelMemory = (operand: MemoryOperand): string => {
  const keyword = operand.size === null ? undefined : SIZE_KEYWORDS[operand.size]
  const sizePart = keyword === undefined ? '' : `${keyword} ptr `

  if (!operand.ripRelative && operand.base === null && operand.index === null) {
    return `${sizePart}${operand.segment ?? 'ds'}:${hex(unsignedAt(operand.displacement, operand.addressWidth))}`
  }

  const terms: string[] = []
  if (operand.ripRelative) terms.push(ipName(operand))
  if (operand.base !== null) terms.push(operand.base.name)
  if (operand.index !== null) terms.push(`${operand.index.name}*${operand.scale}`)
  let inner = terms.join('+')
  if (operand.displacement < 0n) inner += `-${hex(-operand.displacement)}`
  else if (operand.displacement > 0n) inner += `+${hex(operand.displacement)}`

  const segmentPart = operand.segment === null ? '' : `${operand.segment}:`
  return `${sizePart}${segmentPart}[${inner}]`
}

const intelOperand = (instruction: Instruction, operand: Operand): string => {
  switch (operand.kind) {
    case 'register': return operand.register.name
    case 'memory': return intelMemory(operand)
    case 'immediate': return hex(unsignedAt(operand.value, operand.width))
    case 'relative': return hex(relativeTarget(instruction, operand))
    case 'far-pointer': return `0x${operand.selector.toString(16)}:0x${operand.offset.toString(16)}`
  }
}

const formatIntel = (instruction: Instruction): string => {
  const head = [...prefixWords(instruction), instruction.mnemonic.toLowerCase()].join(' ')
  const operands = instruction.operands.map(operand => intelOperand(instruction, operand))
  const text = operands.length === 0 ? head : `${head} ${operands.join(', ')}`
  const target = ripComment(instruction)
  return target === null ? text : `${text}  ; ${hex(target)}`
}

// AT&T syntax

const INTEGER_SUFFIXES: Partial<Record<number, string>> = { 8: 'b', 16: 'w', 32: 'l', 64: 'q' }
const X87_FLOAT_SUFFIXES: Partial<Record<number, string>> = { 32: 's', 64: 'l', 80: 't' }
const X87_INTEGER_SUFFIXES: Partial<Record<number, string>> = { 16: 's', 32: 'l', 64: 'll' }

// Memory operands these touch carry no data width worth a suffix.
const ADDRESS_ONLY = /^(prefetch|clflush|invlpg)/

const INDIRECT_BRANCHES = new Set(['CALL', 'JMP'])

// Source width is part of the name: movzbl, movswq, movslq, crc32b.
const EXTENDING_MOVES: Partial<Record<string, string>> = { MOVZX: 'movz', MOVSX: 'movs', MOVSXD: 'movs' }

// The register operand never matches the width of the integer source.
const ALWAYS_SUFFIXED = new Set(['CVTSI2SS', 'CVTSI2SD'])

// GAS keeps these in Intel order.
const UNREVERSED = new Set(['ENTER'])

const operandWidth = (operand: Operand | undefined): number | null => {
  if (operand === undefined) return null
  if (operand.kind === 'register') return operand.register.width
  if (operand.kind === 'memory') return operand.size
  return null
}

const isFarMemory = (instruction: Instruction): boolean =>
  INDIRECT_BRANCHES.has(instruction.mnemonic) &&
  instruction.operands.some(operand => operand.kind === 'memory' && (operand.size === 48 || operand.size === 80))

// The size suffix is left out when a general purpose register of the same
// width, or any vector, segment or system register, already fixes it.
const attSuffix = (instruction: Instruction, mnemonic: string): string => {
  if (ADDRESS_ONLY.test(mnemonic)) return ''
  let size: number | null = null
  for (const operand of instruction.operands) {
    if (operand.kind === 'memory' && operand.size !== null) {
      size = operand.size
      break
    }
  }
  if (size === null) return ''

  if (!ALWAYS_SUFFIXED.has(instruction.mnemonic)) {
    for (const operand of instruction.operands) {
      if (operand.kind !== 'register') continue
      const { register } = operand
      if (register.class === 'x87') continue
      if (register.class !== 'gpr' || register.width === size) return ''
    }
  }

  if (mnemonic.startsWith('fi')) return X87_INTEGER_SUFFIXES[size] ?? ''
  if (mnemonic.startsWith('f')) return X87_FLOAT_SUFFIXES[size] ?? ''
  return INTEGER_SUFFIXES[size] ?? ''
}

const opcodeByte = (instruction: Instruction): number | undefined =>
  instruction.bytes[instruction.prefixes.count + (instruction.prefixes.rex === null ? 0 : 1)]

// MOV with a 64-bit moffs or a 64-bit immediate.
const isMovabs = (instruction: Instruction): boolean => {
  if (instruction.bitness !== 64 || instruction.mnemonic !== 'MOV') return false
  const opcode = opcodeByte(instruction)
  if (opcode === undefined) return false
  if (opcode >= 0xA0 && opcode <= 0xA3) return instruction.addressSize === 64
  if (opcode >= 0xB8 && opcode <= 0xBF) return instruction.operandSize === 64
  return false
}

const attMnemonic = (instruction: Instruction): string => {
  const lower = instruction.mnemonic.toLowerCase()
  const extending = EXTENDING_MOVES[instruction.mnemonic]
  if (extending !== undefined) {
    const source = INTEGER_SUFFIXES[operandWidth(instruction.operands[1]) ?? 0] ?? ''
    const destination = INTEGER_SUFFIXES[operandWidth(instruction.operands[0]) ?? 0] ?? ''
    return `${extending}${source}${destination}`
  }
  if (instruction.mnemonic === 'CRC32') {
    return `${lower}${INTEGER_SUFFIXES[operandWidth(instruction.operands[1]) ?? 0] ?? ''}`
  }
  if (isMovabs(instruction)) return 'movabs'
  if (isFarMemory(instruction) || instruction.operands.some(operand => operand.kind === 'far-pointer')) {
    return `l${lower}`
  }
  return `${lower}${attSuffix(instruction, lower)}`
}

const attMemory = (operand: MemoryOperand): string => {
  const segmentPart = operand.segment === null ? '' : `%${operand.segment}:`
  if (operand.ripRelative) {
    return `${segmentPart}${signedHex(operand.displacement)}(%${ipName(operand)})`
  }
  if (operand.base === null && operand.index === null) {
    return `${segmentPart}${hex(unsignedAt(operand.displacement, operand.addressWidth))}`
  }
  const displacement = operand.displacement === 0n ? '' : signedHex(operand.displacement)
  const base = operand.base === null ? '' : `%${operand.base.name}`
  const index = operand.index === null ? '' : `,%${operand.index.name},${operand.scale}`
  return `${segmentPart}${displacement}(${base}${index})`
}

const attOperand = (instruction: Instruction, operand: Operand): string => {
  switch (operand.kind) {
    case 'register': return `%${operand.register.name}`
    case 'memory': return attMemory(operand)
    case 'immediate': return `$${hex(unsignedAt(operand.value, operand.width))}`
    case 'relative': return hex(relativeTarget(instruction, operand))
    case 'far-pointer': return `$0x${operand.selector.toString(16)},$0x${operand.offset.toString(16)}`
  }
}

const formatAtt = (instruction: Instruction): string => {
  const head = [...prefixWords(instruction), attMnemonic(instruction)].join(' ')

  const indirect = INDIRECT_BRANCHES.has(instruction.mnemonic)
  const operands = instruction.operands.map(operand => {
    const text = attOperand(instruction, operand)
    return indirect && (operand.kind === 'register' || operand.kind === 'memory') ? `*${text}` : text
  })
  if (!UNREVERSED.has(instruction.mnemonic)) operands.reverse()
  const text = operands.length === 0 ? head : `${head} ${operands.join(',')}`
  const target = ripComment(instruction)
  return target === null ? text : `${text}  # ${hex(target)}`
}

export const formatInstruction = (instruction: Instruction, syntax: Syntax = 'intel'): FormattedInstruction => {
  const hexLine = formatHex(instruction.bytes)
  if (!instruction.valid) return { text: BAD_INSTRUCTION, hex: hexLine }
  return {
    text: syntax === 'att' ? formatAtt(instruction) : formatIntel(instruction),
    hex: hexLine,
  }
}
