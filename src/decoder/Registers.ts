import type { Register, RegisterClass, SegmentName } from './types'

const GPR64 = ['rax', 'rcx', 'rdx', 'rbx', 'rsp', 'rbp', 'rsi', 'rdi']
const GPR32 = ['eax', 'ecx', 'edx', 'ebx', 'esp', 'ebp', 'esi', 'edi']
const GPR16 = ['ax', 'cx', 'dx', 'bx', 'sp', 'bp', 'si', 'di']
const GPR8_LEGACY = ['al', 'cl', 'dl', 'bl', 'ah', 'ch', 'dh', 'bh']
const GPR8_REX = ['al', 'cl', 'dl', 'bl', 'spl', 'bpl', 'sil', 'dil']

export const SEGMENTS: SegmentName[] = ['es', 'cs', 'ss', 'ds', 'fs', 'gs']

// Name of general purpose register `number` (0-15) at `width` bits. Without a
// REX byte, byte registers 4-7 are the high halves ah/ch/dh/bh; any REX turns
// them into spl/bpl/sil/dil instead.
export const gprName = (number: number, width: number, rexPresent: boolean): string => {
  if (number >= 8) {
    const base = `r${number}`
    switch (width) {
      case 8: return `${base}b`
      case 16: return `${base}w`
      case 32: return `${base}d`
      default: return base
    }
  }

  switch (width) {
    case 8: return (rexPresent ? GPR8_REX : GPR8_LEGACY)[number]
    case 16: return GPR16[number]
    case 32: return GPR32[number]
    default: return GPR64[number]
  }
}

export const registerName = (registerClass: RegisterClass, number: number, width: number, rexPresent: boolean): string => {
  switch (registerClass) {
    case 'gpr': return gprName(number, width, rexPresent)
    case 'segment': return SEGMENTS[number] ?? `seg${number}`
    case 'control': return `cr${number}`
    case 'debug': return `dr${number}`
    case 'mmx': return `mm${number}`
    case 'xmm': return `xmm${number}`
    case 'x87': return `st(${number})`
  }
}

const REGISTER_WIDTHS: Record<Exclude<RegisterClass, 'gpr'>, number> = {
  segment: 16,
  control: 64,
  debug: 64,
  mmx: 64,
  xmm: 128,
  x87: 80,
}

export const makeRegister = (registerClass: RegisterClass, number: number, width: number, rexPresent = false): Register => ({
  class: registerClass,
  number,
  width: registerClass === 'gpr' || registerClass === 'control' || registerClass === 'debug'
    ? width
    : REGISTER_WIDTHS[registerClass],
  name: registerName(registerClass, number, width, rexPresent),
})

export const gpr = (number: number, width: number, rexPresent = false): Register =>
  makeRegister('gpr', number, width, rexPresent)

export const segmentRegister = (segment: SegmentName): Register =>
  makeRegister('segment', SEGMENTS.indexOf(segment), 16)
