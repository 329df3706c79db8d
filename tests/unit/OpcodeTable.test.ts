import { describe, it, expect } from 'vitest'
import { lookup, loadOpcodeMap, definedOpcodeCount } from '../../src/decoder/OpcodeTable'
import { OpcodeTableError } from '../../src/decoder/errors'

describe('OpcodeTable', () => {
  describe('one-byte map', () => {
    it('finds plain opcodes without a ModRM byte', () => {
      const nop = lookup('one-byte', 0x90)

      expect(nop?.mnemonic).toBe('NOP')
      expect(nop?.requiresModRM).toBe(false)
      expect(nop?.operands).toHaveLength(0)
      expect(nop?.map).toBe('one-byte')
      expect(nop?.opcode).toBe(0x90)
    })

    it('selects PAUSE under a mandatory F3', () => {
      expect(lookup('one-byte', 0x90, undefined, { mandatoryPrefix: 0xF3 })?.mnemonic).toBe('PAUSE')
    })

    it('resolves group opcodes from ModRM.reg', () => {
      // 0xE8: mod=11 reg=101 rm=000
      const sub = lookup('one-byte', 0x83, 0xE8)

      expect(sub?.mnemonic).toBe('SUB')
      expect(sub?.requiresModRM).toBe(true)
      expect(sub?.immediate).toEqual({ bits: 8, signExtend: true })
      expect(sub?.operands[1]).toEqual({ kind: 'imm', size: 'b', signExtend: true })
    })

    it('returns undefined for a group opcode without its ModRM byte', () => {
      expect(lookup('one-byte', 0xFF)).toBeUndefined()
    })

    it('marks near indirect jumps as forced 64-bit', () => {
      const jmp = lookup('one-byte', 0xFF, 0x25)

      expect(jmp?.mnemonic).toBe('JMP')
      expect(jmp?.flags).toEqual({ d64: false, f64: true, i64: false, o64: false })
    })

    it('returns undefined for empty group slots', () => {
      // FF /7
      expect(lookup('one-byte', 0xFF, 0x38)).toBeUndefined()
    })

    it('splits 63 by processor mode', () => {
      expect(lookup('one-byte', 0x63, 0xC0, { bitness: 64 })?.mnemonic).toBe('MOVSXD')
      expect(lookup('one-byte', 0x63, 0xC0, { bitness: 32 })?.mnemonic).toBe('ARPL')
      expect(lookup('one-byte', 0x63, 0xC0, { bitness: 32 })?.flags.i64).toBe(true)
    })

    it('keeps size-dependent mnemonics', () => {
      expect(lookup('one-byte', 0x98)?.byOperandSize).toEqual({ 16: 'CBW', 64: 'CDQE' })
      expect(lookup('one-byte', 0xE3)?.byAddressSize).toEqual({ 16: 'JCXZ', 64: 'JRCXZ' })
    })

    it('parses split memory and register operand sizes', () => {
      expect(lookup('one-byte', 0x8C, 0xC0)?.operands[0]).toEqual({
        kind: 'rm',
        size: 'w',
        registerSize: 'v',
        registerClass: 'gpr',
        form: 'any',
      })
    })

    it('has no MOV into CS', () => {
      // 8E /1
      expect(lookup('one-byte', 0x8E, 0xC8)).toBeUndefined()
      expect(lookup('one-byte', 0x8E, 0xD8)?.mnemonic).toBe('MOV')
    })

    it('covers x87 register forms', () => {
      // D9 E8: mod=11 reg=101 rm=000
      expect(lookup('one-byte', 0xD9, 0xE8)?.mnemonic).toBe('FLD1')
      // DF /5 memory
      expect(lookup('one-byte', 0xDF, 0x28)?.mnemonic).toBe('FILD')
      expect(lookup('one-byte', 0xDF, 0x28)?.operands[0]).toMatchObject({ kind: 'rm', size: 'q', form: 'memory' })
    })

    it('rejects opcodes outside a byte', () => {
      expect(lookup('one-byte', 256)).toBeUndefined()
      expect(lookup('one-byte', -1)).toBeUndefined()
    })
  })

  describe('0F map', () => {
    it('finds SYSCALL', () => {
      expect(lookup('0f', 0x05)?.mnemonic).toBe('SYSCALL')
    })

    it('returns undefined for undefined opcodes', () => {
      expect(lookup('0f', 0xFF)).toBeUndefined()
      expect(lookup('0f', 0x0A)).toBeUndefined()
    })

    it('selects SSE forms by mandatory prefix', () => {
      expect(lookup('0f', 0x10, 0xC1)?.mnemonic).toBe('MOVUPS')
      expect(lookup('0f', 0x10, 0xC1, { mandatoryPrefix: 0x66 })?.mnemonic).toBe('MOVUPD')
      expect(lookup('0f', 0x10, 0xC1, { mandatoryPrefix: 0xF3 })?.mnemonic).toBe('MOVSS')
      expect(lookup('0f', 0x10, 0xC1, { mandatoryPrefix: 0xF2 })?.mnemonic).toBe('MOVSD')
    })

    it('expands packed and scalar families', () => {
      expect(lookup('0f', 0x58, 0xC1)?.mnemonic).toBe('ADDPS')
      expect(lookup('0f', 0x58, 0xC1, { mandatoryPrefix: 0xF2 })?.mnemonic).toBe('ADDSD')
      expect(lookup('0f', 0x54, 0xC1, { mandatoryPrefix: 0x66 })?.mnemonic).toBe('ANDPD')
    })

    it('expands MMX and SSE2 integer pairs', () => {
      const mmx = lookup('0f', 0xEF, 0xC1)
      const sse = lookup('0f', 0xEF, 0xC1, { mandatoryPrefix: 0x66 })

      expect(mmx?.mnemonic).toBe('PXOR')
      expect(mmx?.operands[0]).toEqual({ kind: 'reg', size: 'q', registerClass: 'mmx' })
      expect(sse?.mnemonic).toBe('PXOR')
      expect(sse?.operands[0]).toEqual({ kind: 'reg', size: 'dq', registerClass: 'xmm' })
    })

    it('selects by REX.W', () => {
      // 0F C7 /1 memory
      expect(lookup('0f', 0xC7, 0x08)?.mnemonic).toBe('CMPXCHG8B')
      expect(lookup('0f', 0xC7, 0x08, { rexW: true })?.mnemonic).toBe('CMPXCHG16B')
      expect(lookup('0f', 0x6E, 0xC0, { rexW: true })?.mnemonic).toBe('MOVQ')
    })

    it('finds ENDBR32 and ENDBR64', () => {
      expect(lookup('0f', 0x1E, 0xFA, { mandatoryPrefix: 0xF3 })?.mnemonic).toBe('ENDBR64')
      expect(lookup('0f', 0x1E, 0xFB, { mandatoryPrefix: 0xF3 })?.mnemonic).toBe('ENDBR32')
      expect(lookup('0f', 0x1E, 0xFA, { mandatoryPrefix: 0xF3 })?.operands).toEqual([])
      expect(lookup('0f', 0x1E, 0xFA)?.mnemonic).toBe('NOP')
    })

    it('marks SWAPGS as 64-bit only', () => {
      expect(lookup('0f', 0x01, 0xF8)?.mnemonic).toBe('SWAPGS')
      expect(lookup('0f', 0x01, 0xF8)?.flags.o64).toBe(true)
    })
  })

  describe('three-byte maps', () => {
    it('selects CRC32 under F2 and MOVBE otherwise', () => {
      expect(lookup('0f38', 0xF1, 0x01)?.mnemonic).toBe('MOVBE')
      expect(lookup('0f38', 0xF1, 0xC1, { mandatoryPrefix: 0xF2 })?.mnemonic).toBe('CRC32')
    })

    it('selects PEXTRQ with REX.W', () => {
      expect(lookup('0f3a', 0x16, 0xC0, { mandatoryPrefix: 0x66 })?.mnemonic).toBe('PEXTRD')
      expect(lookup('0f3a', 0x16, 0xC0, { mandatoryPrefix: 0x66, rexW: true })?.mnemonic).toBe('PEXTRQ')
    })

    it('requires the 66 prefix for SSE4.1 forms', () => {
      expect(lookup('0f38', 0x17, 0xC1)).toBeUndefined()
      expect(lookup('0f38', 0x17, 0xC1, { mandatoryPrefix: 0x66 })?.mnemonic).toBe('PTEST')
    })

    it('counts defined slots', () => {
      expect(definedOpcodeCount('0f38')).toBe(59)
      expect(definedOpcodeCount('0f3a')).toBe(25)
      expect(definedOpcodeCount('one-byte')).toBe(243)
    })
  })

  describe('table validation', () => {
    it('rejects unknown operand sizes', () => {
      expect(() => loadOpcodeMap({ '90': { m: 'NOP', o: ['Qx'] } }, 'one-byte')).toThrow(OpcodeTableError)
    })

    it('rejects bad opcode keys', () => {
      expect(() => loadOpcodeMap({ ZZ: { m: 'NOP' } }, 'one-byte')).toThrow("one-byte: bad opcode key 'ZZ'")
    })

    it('rejects unknown groups', () => {
      expect(() => loadOpcodeMap({ '00': { g: 'grp99' } }, '0f')).toThrow("0f/00: unknown group 'grp99'")
    })

    it('rejects tables that are not objects', () => {
      expect(() => loadOpcodeMap([], '0f38')).toThrow(OpcodeTableError)
    })

    it('builds a valid custom map', () => {
      const map = loadOpcodeMap({ '01': { m: 'ADD', o: ['Ev', 'Gv'] } }, 'one-byte')

      expect(map).toHaveLength(256)
      expect(map[0]).toBeNull()
      expect(map[1]?.kind).toBe('template')
    })
  })
})
