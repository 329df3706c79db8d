export type Bitness = 16 | 32 | 64

export type EscapeMap = 'one-byte' | '0f' | '0f38' | '0f3a'

export type SegmentName = 'es' | 'cs' | 'ss' | 'ds' | 'fs' | 'gs'

export type RegisterClass = 'gpr' | 'segment' | 'control' | 'debug' | 'mmx' | 'xmm' | 'x87'

export interface Register {
  class: RegisterClass
  number: number
  width: number
  name: string
}

export interface RexPrefix {
  w: boolean
  r: boolean
  x: boolean
  b: boolean
}

export interface PrefixState {
  lock: boolean
  repeat: 'rep' | 'repne' | null
  segment: SegmentName | null
  operandSize: boolean
  addressSize: boolean
  rex: RexPrefix | null
  count: number  // legacy prefix bytes, REX excluded
}

export interface RegisterOperand {
  kind: 'register'
  register: Register
}

export interface MemoryOperand {
  kind: 'memory'
  base: Register | null
  index: Register | null
  scale: 1 | 2 | 4 | 8
  displacement: bigint
  segment: SegmentName | null
  addressWidth: 16 | 32 | 64
  size: number | null  // bits accessed, null when the instruction only computes the address
  ripRelative: boolean
}

export interface ImmediateOperand {
  kind: 'immediate'
  value: bigint
  width: number
}

export interface RelativeOperand {
  kind: 'relative'
  displacement: number
  width: number
}

export interface FarPointerOperand {
  kind: 'far-pointer'
  selector: number
  offset: number
}

export type Operand =
  | RegisterOperand
  | MemoryOperand
  | ImmediateOperand
  | RelativeOperand
  | FarPointerOperand

export type MandatoryPrefix = 0x66 | 0xF2 | 0xF3

export interface Instruction {
  address: bigint
  length: number
  mnemonic: string
  operands: Operand[]
  prefixes: PrefixState
  bytes: Uint8Array
  valid: boolean
  bitness: Bitness
  operandSize: 16 | 32 | 64
  addressSize: 16 | 32 | 64
  mandatoryPrefix: MandatoryPrefix | null
}

// Operand size codes from the Intel opcode-map notation, plus 'n' for the
// native width of the current mode and 't' for 80-bit x87 operands.
export type SizeCode =
  | 'b' | 'w' | 'd' | 'q' | 'v' | 'z' | 'y' | 'n'
  | 'dq' | 'ps' | 'pd' | 'ss' | 'sd' | 't' | 'p' | ''

export type FixedRegisterName =
  | 'AL' | 'CL' | 'DL' | 'BL' | 'AH' | 'CH' | 'DH' | 'BH'
  | 'AX' | 'DX' | 'rAX' | 'eAX'
  | 'ES' | 'CS' | 'SS' | 'DS' | 'FS' | 'GS'
  | 'ST' | 'XMM0'

export type OperandSpec =
  | { kind: 'rm'; size: SizeCode; registerSize: SizeCode; registerClass: RegisterClass; form: 'any' | 'memory' | 'register' }
  | { kind: 'reg'; size: SizeCode; registerClass: RegisterClass }
  | { kind: 'opcode-reg'; size: SizeCode }
  | { kind: 'imm'; size: SizeCode; signExtend: boolean }
  | { kind: 'rel'; size: SizeCode }
  | { kind: 'moffs'; size: SizeCode }
  | { kind: 'string'; size: SizeCode; role: 'source' | 'destination' }
  | { kind: 'far' }
  | { kind: 'fixed'; register: FixedRegisterName }
  | { kind: 'st-rm' }
  | { kind: 'const'; value: number }

export interface TemplateFlags {
  d64: boolean
  f64: boolean
  i64: boolean
  o64: boolean
}

export interface ImmediateClass {
  bits: 'none' | 8 | 16 | 32 | 64 | 'z' | 'v'
  signExtend: boolean
}

export interface OpcodeTemplate {
  mnemonic: string
  operands: OperandSpec[]
  map: EscapeMap
  opcode: number
  requiresModRM: boolean
  immediate: ImmediateClass
  flags: TemplateFlags
  byOperandSize: Partial<Record<16 | 32 | 64, string>>
  byAddressSize: Partial<Record<16 | 32 | 64, string>>
}
