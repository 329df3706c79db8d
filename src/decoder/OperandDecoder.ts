import type {
  Bitness,
  FixedRegisterName,
  MemoryOperand,
  Operand,
  OperandSpec,
  PrefixState,
  Register,
  RegisterClass,
  SegmentName,
  SizeCode,
} from './types'
import type { ByteReader } from './ByteReader'
import { InvalidEncodingError } from './errors'
import { gpr, makeRegister, segmentRegister } from './Registers'

export type OperandWidth = 16 | 32 | 64

export interface OperandContext {
  bitness: Bitness
  prefixes: PrefixState
  operandSize: OperandWidth
  addressSize: OperandWidth
  opcode: number  // last opcode byte, for registers encoded in its low bits
  modrm: number | null
}

// Bits a size code stands for at the given operand size; null for 'M' style
// operands that only name an address.
export const resolveSize = (size: SizeCode, operandSize: OperandWidth, bitness: Bitness): number | null => {
  switch (size) {
    case 'b': return 8
    case 'w': return 16
    case 'd': return 32
    case 'q': return 64
    case 'v': return operandSize
    case 'z': return operandSize === 16 ? 16 : 32
    case 'y': return operandSize === 64 ? 64 : 32
    case 'n': return bitness === 64 ? 64 : 32
    case 'dq':
    case 'ps':
    case 'pd': return 128
    case 'ss': return 32
    case 'sd': return 64
    case 't': return 80
    case 'p': return operandSize === 16 ? 32 : operandSize === 32 ? 48 : 80
    case '': return null
  }
}

const requireSize = (size: SizeCode, context: OperandContext): number => {
  const bits = resolveSize(size, context.operandSize, context.bitness)
  if (bits === null) {
    throw new InvalidEncodingError(`operand size '${size}' does not name a register width`)
  }
  return bits
}

const FIXED_REGISTERS: Record<FixedRegisterName, (context: OperandContext) => Register> = {
  AL: () => gpr(0, 8),
  CL: () => gpr(1, 8),
  DL: () => gpr(2, 8),
  BL: () => gpr(3, 8),
  AH: () => gpr(4, 8),
  CH: () => gpr(5, 8),
  DH: () => gpr(6, 8),
  BH: () => gpr(7, 8),
  AX: () => gpr(0, 16),
  DX: () => gpr(2, 16),
  rAX: context => gpr(0, context.operandSize),
  eAX: context => gpr(0, context.operandSize === 16 ? 16 : 32),
  ES: () => segmentRegister('es'),
  CS: () => segmentRegister('cs'),
  SS: () => segmentRegister('ss'),
  DS: () => segmentRegister('ds'),
  FS: () => segmentRegister('fs'),
  GS: () => segmentRegister('gs'),
  ST: () => makeRegister('x87', 0, 80),
  XMM0: () => makeRegister('xmm', 0, 128),
}

const requireModRM = (context: OperandContext): number => {
  if (context.modrm === null) {
    throw new InvalidEncodingError('operand needs a ModRM byte')
  }
  return context.modrm
}

const rexBit = (set: boolean | undefined): number => (set ? 8 : 0)

// Which register files take the fourth register-number bit from REX.
const extendsWithRex = (registerClass: RegisterClass): boolean =>
  registerClass === 'gpr' || registerClass === 'xmm' || registerClass === 'control' || registerClass === 'debug'

const registerFor = (registerClass: RegisterClass, number: number, width: number, context: OperandContext): Register => {
  if (registerClass === 'segment' && number > 5) {
    throw new InvalidEncodingError(`segment register ${number} does not exist`)
  }
  const controlWidth = context.bitness === 64 ? 64 : 32
  const actualWidth = registerClass === 'control' || registerClass === 'debug' ? controlWidth : width
  return makeRegister(registerClass, number, actualWidth, context.prefixes.rex !== null)
}

// In 64-bit mode only FS and GS overrides change the effective address.
const effectiveSegment = (context: OperandContext): SegmentName | null => {
  const segment = context.prefixes.segment
  if (context.bitness === 64 && segment !== 'fs' && segment !== 'gs') return null
  return segment
}

const memory = (
  context: OperandContext,
  fields: Partial<Pick<MemoryOperand, 'base' | 'index' | 'scale' | 'displacement' | 'segment' | 'ripRelative'>>,
): MemoryOperand => ({
  kind: 'memory',
  base: fields.base ?? null,
  index: fields.index ?? null,
  scale: fields.scale ?? 1,
  displacement: fields.displacement ?? 0n,
  segment: fields.segment === undefined ? effectiveSegment(context) : fields.segment,
  addressWidth: context.addressSize,
  size: null,
  ripRelative: fields.ripRelative ?? false,
})

// [bx+si] style forms, indexed by ModRM.rm.
const MODRM16: ReadonlyArray<[number | null, number | null]> = [
  [3, 6], [3, 7], [5, 6], [5, 7], [6, null], [7, null], [5, null], [3, null],
]

const decodeMemory16 = (reader: ByteReader, modrm: number, context: OperandContext): MemoryOperand => {
  const mod = modrm >> 6
  const rm = modrm & 7
  if (mod === 0 && rm === 6) {
    return memory(context, { displacement: reader.signed(16) })
  }
  const [base, index] = MODRM16[rm]
  const displacement = mod === 1 ? reader.signed(8) : mod === 2 ? reader.signed(16) : 0n
  return memory(context, {
    base: base === null ? null : gpr(base, 16),
    index: index === null ? null : gpr(index, 16),
    displacement,
  })
}

const SCALES = [1, 2, 4, 8] as const

const decodeMemory = (reader: ByteReader, modrm: number, context: OperandContext): MemoryOperand => {
  if (context.addressSize === 16) return decodeMemory16(reader, modrm, context)

  const rex = context.prefixes.rex
  const width = context.addressSize
  const mod = modrm >> 6
  const rm = modrm & 7

  let base: Register | null = null
  let index: Register | null = null
  let scale: 1 | 2 | 4 | 8 = 1
  let displacement = 0n
  let ripRelative = false

  if (rm === 4) {
    const sib = reader.u8()
    scale = SCALES[sib >> 6]
    const indexNumber = ((sib >> 3) & 7) | rexBit(rex?.x)
    if (indexNumber !== 4) index = gpr(indexNumber, width)
    if ((sib & 7) === 5 && mod === 0) {
      displacement = reader.signed(32)
    } else {
      base = gpr((sib & 7) | rexBit(rex?.b), width)
    }
  } else if (rm === 5 && mod === 0) {
    displacement = reader.signed(32)
    ripRelative = context.bitness === 64
  } else {
    base = gpr(rm | rexBit(rex?.b), width)
  }

  if (mod === 1) displacement = reader.signed(8)
  else if (mod === 2) displacement = reader.signed(32)

  return memory(context, { base, index, scale, displacement, ripRelative })
}

const decodeRm = (
  spec: Extract<OperandSpec, { kind: 'rm' }>,
  address: MemoryOperand | null,
  context: OperandContext,
): Operand => {
  const modrm = requireModRM(context)
  if (address !== null) {
    if (spec.form === 'register') {
      throw new InvalidEncodingError('register-only operand encoded as memory')
    }
    return { ...address, size: resolveSize(spec.size, context.operandSize, context.bitness) }
  }
  if (spec.form === 'memory') {
    throw new InvalidEncodingError('memory-only operand encoded as register')
  }
  const extension = spec.registerClass === 'mmx' ? 0 : rexBit(context.prefixes.rex?.b)
  const number = (modrm & 7) | extension
  const width = requireSize(spec.registerSize, context)
  return { kind: 'register', register: registerFor(spec.registerClass, number, width, context) }
}

const decodeReg = (spec: Extract<OperandSpec, { kind: 'reg' }>, context: OperandContext): Operand => {
  const modrm = requireModRM(context)
  const extension = extendsWithRex(spec.registerClass) ? rexBit(context.prefixes.rex?.r) : 0
  const number = ((modrm >> 3) & 7) | extension
  const width = spec.registerClass === 'gpr' ? requireSize(spec.size, context) : 0
  return { kind: 'register', register: registerFor(spec.registerClass, number, width, context) }
}

const decodeImmediate = (reader: ByteReader, spec: Extract<OperandSpec, { kind: 'imm' }>, context: OperandContext): Operand => {
  switch (spec.size) {
    case 'b': {
      const value = reader.signed(8)
      return { kind: 'immediate', value, width: spec.signExtend ? context.operandSize : 8 }
    }
    case 'w': return { kind: 'immediate', value: reader.signed(16), width: 16 }
    case 'd': return { kind: 'immediate', value: reader.signed(32), width: 32 }
    case 'q': return { kind: 'immediate', value: reader.signed(64), width: 64 }
    case 'z':
      return context.operandSize === 16
        ? { kind: 'immediate', value: reader.signed(16), width: 16 }
        : { kind: 'immediate', value: reader.signed(32), width: context.operandSize }
    case 'v':
      return { kind: 'immediate', value: reader.signed(context.operandSize), width: context.operandSize }
    default:
      throw new InvalidEncodingError(`immediate of size '${spec.size}' is not encodable`)
  }
}

const decodeRelative = (reader: ByteReader, spec: Extract<OperandSpec, { kind: 'rel' }>, context: OperandContext): Operand => {
  if (spec.size === 'b') {
    return { kind: 'relative', displacement: Number(reader.signed(8)), width: 8 }
  }
  if (context.operandSize === 16) {
    return { kind: 'relative', displacement: Number(reader.signed(16)), width: 16 }
  }
  return { kind: 'relative', displacement: Number(reader.signed(32)), width: 32 }
}

const decodeString = (spec: Extract<OperandSpec, { kind: 'string' }>, context: OperandContext): Operand => {
  const source = spec.role === 'source'
  return {
    ...memory(context, {
      base: gpr(source ? 6 : 7, context.addressSize),
      segment: source ? context.prefixes.segment ?? 'ds' : 'es',
    }),
    size: resolveSize(spec.size, context.operandSize, context.bitness),
  }
}

// MOV to or from CRn/DRn reads ModRM.rm as a register whatever the mod bits say.
const movesSystemRegister = (spec: OperandSpec): boolean =>
  spec.kind === 'reg' && (spec.registerClass === 'control' || spec.registerClass === 'debug')

// Decodes the operands of one template. The memory operand, if any, is read
// first because SIB and displacement bytes precede every immediate.
export const decodeOperands = (reader: ByteReader, specs: readonly OperandSpec[], context: OperandContext): Operand[] => {
  const usesMemoryForm = specs.some(spec => spec.kind === 'rm')
    && !specs.some(movesSystemRegister)
    && context.modrm !== null
    && (context.modrm >> 6) !== 3
  const address = usesMemoryForm && context.modrm !== null ? decodeMemory(reader, context.modrm, context) : null

  return specs.map((spec): Operand => {
    switch (spec.kind) {
      case 'rm': return decodeRm(spec, address, context)
      case 'reg': return decodeReg(spec, context)
      case 'opcode-reg': {
        const number = (context.opcode & 7) | rexBit(context.prefixes.rex?.b)
        return { kind: 'register', register: gpr(number, requireSize(spec.size, context), context.prefixes.rex !== null) }
      }
      case 'imm': return decodeImmediate(reader, spec, context)
      case 'rel': return decodeRelative(reader, spec, context)
      case 'moffs':
        return {
          ...memory(context, { displacement: reader.unsigned(context.addressSize) }),
          size: resolveSize(spec.size, context.operandSize, context.bitness),
        }
      case 'string': return decodeString(spec, context)
      case 'far': {
        const offset = context.operandSize === 16 ? reader.u16() : reader.u32()
        return { kind: 'far-pointer', selector: reader.u16(), offset }
      }
      case 'fixed': return { kind: 'register', register: FIXED_REGISTERS[spec.register](context) }
      case 'st-rm': return { kind: 'register', register: makeRegister('x87', requireModRM(context) & 7, 80) }
      case 'const': return { kind: 'immediate', value: BigInt(spec.value), width: 8 }
    }
  })
}
