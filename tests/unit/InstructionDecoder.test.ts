import { describe, it, expect } from 'vitest'
import {
  branchTarget,
  createDecodeContext,
  decodeOne,
  disassemble,
  disassembleAll,
  effectiveAddress,
  MAX_INSTRUCTION_LENGTH,
} from '../../src/decoder/InstructionDecoder'
import { DecoderConfigError } from '../../src/decoder/errors'
import type { Bitness, Instruction } from '../../src/decoder/types'

const decode = (bytes: number[], bitness: Bitness = 64, address = 0n): Instruction =>
  decodeOne(new Uint8Array(bytes), 0, address, bitness)

const list = (bytes: number[], bitness: Bitness = 64): Instruction[] =>
  disassembleAll(new Uint8Array(bytes), { bitness })

const registerNames = (instruction: Instruction): string[] =>
  instruction.operands.map(operand => (operand.kind === 'register' ? operand.register.name : operand.kind))

// Deterministic pseudo-random bytes for the stream properties.
const randomBytes = (seed: number, length: number): Uint8Array => {
  const bytes = new Uint8Array(length)
  let state = seed >>> 0
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0
    bytes[i] = state >>> 24
  }
  return bytes
}

describe('InstructionDecoder', () => {
  describe('basic encodings', () => {
    it('decodes NOP', () => {
      const nop = decode([0x90])

      expect(nop.mnemonic).toBe('NOP')
      expect(nop.length).toBe(1)
      expect(nop.valid).toBe(true)
      expect(nop.operands).toHaveLength(0)
      expect(Array.from(nop.bytes)).toEqual([0x90])
    })

    it('decodes MOV rbp, rsp', () => {
      const mov = decode([0x48, 0x89, 0xE5])

      expect(mov.mnemonic).toBe('MOV')
      expect(mov.length).toBe(3)
      expect(mov.operandSize).toBe(64)
      expect(registerNames(mov)).toEqual(['rbp', 'rsp'])
    })

    it('decodes RET and SYSCALL', () => {
      expect(decode([0xC3]).mnemonic).toBe('RET')
      expect(decode([0x0F, 0x05]).mnemonic).toBe('SYSCALL')
      expect(decode([0x0F, 0x05]).length).toBe(2)
    })

    it('decodes a RIP-relative indirect jump', () => {
      const jmp = decode([0xFF, 0x25, 0x00, 0x00, 0x00, 0x00], 64, 0x1000n)

      expect(jmp.mnemonic).toBe('JMP')
      expect(jmp.length).toBe(6)
      expect(jmp.operands[0]).toMatchObject({ kind: 'memory', ripRelative: true, size: 64, displacement: 0n })
      expect(effectiveAddress(jmp, jmp.operands[0])).toBe(0x1006n)
    })

    it('reads a full 64-bit immediate under REX.W', () => {
      const mov = decode([0x48, 0xB8, 0x88, 0x77, 0x66, 0x55, 0x44, 0x33, 0x22, 0x11])

      expect(mov.length).toBe(10)
      expect(registerNames(mov)[0]).toBe('rax')
      expect(mov.operands[1]).toEqual({ kind: 'immediate', value: 0x1122334455667788n, width: 64 })
    })

    it('sign-extends an 8-bit immediate to the operand size', () => {
      const and = decode([0x48, 0x83, 0xE4, 0xF0])

      expect(and.mnemonic).toBe('AND')
      expect(and.operands[1]).toEqual({ kind: 'immediate', value: -16n, width: 64 })
    })
  })

  describe('processor modes', () => {
    it('computes rel32 targets in 32-bit mode', () => {
      const call = decode([0xE8, 0xFB, 0xFF, 0xFF, 0xFF], 32, 0x401000n)

      expect(call.mnemonic).toBe('CALL')
      expect(call.operandSize).toBe(32)
      expect(branchTarget(call)).toBe(0x401000n)
    })

    it('computes rel8 targets', () => {
      expect(branchTarget(decode([0xEB, 0xFE], 64, 0x1000n))).toBe(0x1000n)
      expect(branchTarget(decode([0x90]))).toBeNull()
    })

    it('wraps 16-bit branch targets to IP', () => {
      const jmp = decode([0xE9, 0x10, 0x00], 16, 0xFFF0n)

      expect(jmp.operands[0]).toEqual({ kind: 'relative', displacement: 0x10, width: 16 })
      expect(branchTarget(jmp)).toBe(0x3n)
    })

    it('uses 16-bit defaults in 16-bit mode', () => {
      const mov = decode([0x8B, 0x46, 0xFE], 16)

      expect(mov.operandSize).toBe(16)
      expect(mov.addressSize).toBe(16)
      expect(registerNames(mov)[0]).toBe('ax')
      expect(mov.operands[1]).toMatchObject({ base: { name: 'bp' }, displacement: -2n, size: 16 })
    })

    it('switches to 16-bit addressing under 67 in 32-bit mode', () => {
      const mov = decode([0x67, 0x8B, 0x07], 32)

      expect(mov.length).toBe(3)
      expect(mov.addressSize).toBe(16)
      expect(mov.operands[1]).toMatchObject({ base: { name: 'bx' }, index: null, size: 32 })
    })

    it('reads far pointers in 32-bit mode', () => {
      const jmp = decode([0xEA, 0x78, 0x56, 0x34, 0x12, 0x10, 0x00], 32)

      expect(jmp.length).toBe(7)
      expect(jmp.operands[0]).toEqual({ kind: 'far-pointer', selector: 0x10, offset: 0x12345678 })
    })

    it('shortens near branches to rel16 under 66 in 64-bit mode', () => {
      const call = decode([0x66, 0xE8, 0x00, 0x00], 64, 0x1000n)
      const jmp = decode([0x66, 0xE9, 0xFC, 0xFF], 64, 0x1000n)

      expect(call.mnemonic).toBe('CALL')
      expect(call.length).toBe(4)
      expect(call.operandSize).toBe(16)
      expect(call.operands[0]).toEqual({ kind: 'relative', displacement: 0, width: 16 })
      expect(branchTarget(call)).toBe(0x1004n)
      expect(jmp.mnemonic).toBe('JMP')
      expect(jmp.length).toBe(4)
      expect(branchTarget(jmp)).toBe(0x1000n)
    })

    it('wraps 16-bit branch targets in 64-bit mode', () => {
      expect(branchTarget(decode([0x66, 0xE8, 0x10, 0x00], 64, 0x12345678n))).toBe(0x568Cn)
    })

    it('keeps rel32 when REX.W overrides 66 on a branch', () => {
      const call = decode([0x66, 0x48, 0xE8, 0x00, 0x00, 0x00, 0x00], 64, 0x1000n)

      expect(call.length).toBe(7)
      expect(call.operandSize).toBe(64)
      expect(branchTarget(call)).toBe(0x1007n)
    })

    it('continues after a 66-prefixed call', () => {
      expect(list([0x66, 0xE8, 0x00, 0x00, 0x90]).map(instruction => instruction.mnemonic)).toEqual(['CALL', 'NOP'])
    })

    it('rejects instructions invalid in 64-bit mode', () => {
      const push = decode([0x06])

      expect(push.valid).toBe(false)
      expect(push.mnemonic).toBe('INVALID')
      expect(push.length).toBe(1)
      expect(decode([0x06], 32).mnemonic).toBe('PUSH')
    })

    it('rejects 64-bit only instructions elsewhere', () => {
      expect(decode([0x0F, 0x01, 0xF8]).mnemonic).toBe('SWAPGS')

      const legacy = decode([0x0F, 0x01, 0xF8], 32)
      expect(legacy.valid).toBe(false)
      expect(legacy.length).toBe(3)
    })
  })

  describe('register naming', () => {
    it('names byte registers by REX presence', () => {
      expect(registerNames(decode([0x40, 0x88, 0xF0]))).toEqual(['al', 'sil'])
      expect(registerNames(decode([0x88, 0xF0]))).toEqual(['al', 'dh'])
    })

    it('extends opcode registers with REX.B', () => {
      const push = decode([0x41, 0x50])

      expect(push.mnemonic).toBe('PUSH')
      expect(push.operandSize).toBe(64)
      expect(registerNames(push)).toEqual(['r8'])
    })

    it('decodes 90 with REX.B as an exchange with r8', () => {
      const xchg = decode([0x49, 0x90])

      expect(xchg.mnemonic).toBe('XCHG')
      expect(registerNames(xchg)).toEqual(['r8', 'rax'])
    })
  })

  describe('prefixes', () => {
    it('consumes 66 as a mandatory prefix', () => {
      const movdqa = decode([0x66, 0x0F, 0x6F, 0xC1])

      expect(movdqa.mnemonic).toBe('MOVDQA')
      expect(movdqa.mandatoryPrefix).toBe(0x66)
      expect(movdqa.operandSize).toBe(32)
      expect(registerNames(movdqa)).toEqual(['xmm0', 'xmm1'])
    })

    it('keeps F3 as a repeat prefix on string instructions', () => {
      const movs = decode([0xF3, 0xA4])

      expect(movs.mnemonic).toBe('MOVS')
      expect(movs.mandatoryPrefix).toBeNull()
      expect(movs.prefixes.repeat).toBe('rep')
      expect(movs.operands[0]).toMatchObject({ base: { name: 'rdi' }, segment: 'es', size: 8 })
      expect(movs.operands[1]).toMatchObject({ base: { name: 'rsi' }, segment: 'ds', size: 8 })
    })

    it('decodes ENDBR64', () => {
      const endbr = decode([0xF3, 0x0F, 0x1E, 0xFA])

      expect(endbr.mnemonic).toBe('ENDBR64')
      expect(endbr.length).toBe(4)
      expect(endbr.mandatoryPrefix).toBe(0xF3)
      expect(endbr.operands).toEqual([])
    })

    it('decodes CRC32 through the 0F 38 map', () => {
      const crc = decode([0xF2, 0x48, 0x0F, 0x38, 0xF1, 0xC1])

      expect(crc.mnemonic).toBe('CRC32')
      expect(crc.length).toBe(6)
      expect(crc.mandatoryPrefix).toBe(0xF2)
      expect(registerNames(crc)).toEqual(['rax', 'rcx'])
    })

    it('picks mnemonics by address size', () => {
      expect(decode([0xE3, 0x00]).mnemonic).toBe('JRCXZ')
      expect(decode([0x67, 0xE3, 0x00]).mnemonic).toBe('JECXZ')
      expect(decode([0xE3, 0x00], 32).mnemonic).toBe('JECXZ')
    })

    it('picks mnemonics by operand size', () => {
      expect(decode([0x98]).mnemonic).toBe('CWDE')
      expect(decode([0x48, 0x98]).mnemonic).toBe('CDQE')
      expect(decode([0x66, 0x98]).mnemonic).toBe('CBW')
    })

    it('accepts fourteen prefixes', () => {
      const bytes = [...new Array<number>(14).fill(0x66), 0x90]
      const nop = decode(bytes)

      expect(nop.mnemonic).toBe('NOP')
      expect(nop.length).toBe(MAX_INSTRUCTION_LENGTH)
    })

    it('rejects a fifteenth prefix and resumes after the window', () => {
      const bytes = [...new Array<number>(15).fill(0x66), 0x90]
      const [invalid, nop] = list(bytes)

      expect(invalid.valid).toBe(false)
      expect(invalid.length).toBe(15)
      expect(nop.mnemonic).toBe('NOP')
      expect(nop.address).toBe(15n)
    })

    it('rejects a legacy prefix after REX', () => {
      const [invalid, nop] = list([0x48, 0x66, 0x90])

      expect(invalid.valid).toBe(false)
      expect(invalid.length).toBe(2)
      expect(nop.mnemonic).toBe('NOP')
    })
  })

  describe('invalid encodings', () => {
    it('emits an undefined opcode as a record of the bytes read', () => {
      const [invalid, nop] = list([0x0F, 0xFF, 0x90])

      expect(invalid.mnemonic).toBe('INVALID')
      expect(invalid.length).toBe(2)
      expect(Array.from(invalid.bytes)).toEqual([0x0F, 0xFF])
      expect(nop.address).toBe(2n)
    })

    it('covers the rest of the window when the instruction is truncated', () => {
      const mov = decode([0xB8, 0x01, 0x02], 32)

      expect(mov.valid).toBe(false)
      expect(mov.length).toBe(3)
    })

    it('rejects segment register 6', () => {
      const mov = decode([0x8E, 0xF0])

      expect(mov.valid).toBe(false)
      expect(mov.length).toBe(2)
    })

    it('rejects MOV into CS', () => {
      const mov = decode([0x8E, 0xC8])

      expect(mov.valid).toBe(false)
      expect(mov.length).toBe(2)
      expect(registerNames(decode([0x8E, 0xD8]))).toEqual(['ds', 'ax'])
    })

    it('reads control and debug register moves as registers whatever the mod bits', () => {
      const fromCr0 = decode([0x0F, 0x20, 0x00])
      const toCr3 = decode([0x0F, 0x22, 0x18])

      expect(fromCr0.valid).toBe(true)
      expect(fromCr0.length).toBe(3)
      expect(registerNames(fromCr0)).toEqual(['rax', 'cr0'])
      expect(registerNames(toCr3)).toEqual(['cr3', 'rax'])
      expect(registerNames(decode([0x0F, 0x21, 0xC7]))).toEqual(['rdi', 'dr0'])
      expect(registerNames(decode([0x0F, 0x20, 0xC0], 32))).toEqual(['eax', 'cr0'])
    })

    it('rejects LEA with a register operand', () => {
      const lea = decode([0x8D, 0xC0])

      expect(lea.valid).toBe(false)
      expect(lea.length).toBe(2)
    })
  })

  describe('configuration', () => {
    it('rejects unsupported bitness', () => {
      expect(() => createDecodeContext({ bitness: 8 })).toThrow(DecoderConfigError)
      expect(() => disassemble(new Uint8Array([0x90]), { bitness: 128 })).toThrow('unsupported bitness 128')
    })

    it('rejects bad base addresses', () => {
      expect(() => createDecodeContext({ bitness: 64, baseAddress: -1 })).toThrow(DecoderConfigError)
      expect(() => createDecodeContext({ bitness: 64, baseAddress: 1.5 })).toThrow(DecoderConfigError)
      expect(() => createDecodeContext({ bitness: 64, baseAddress: -1n })).toThrow(DecoderConfigError)
    })

    it('accepts number and bigint base addresses', () => {
      expect(createDecodeContext({ bitness: 32, baseAddress: 0x401000 }).baseAddress).toBe(0x401000n)
      expect(createDecodeContext({ bitness: 64 }).baseAddress).toBe(0n)
    })

    it('rejects an empty buffer', () => {
      expect(() => disassemble(new Uint8Array(0), { bitness: 64 })).toThrow('cannot disassemble an empty buffer')
    })

    it('rejects a cursor outside the buffer', () => {
      expect(() => decodeOne(new Uint8Array([0x90]), 1, 0n, 64)).toThrow(DecoderConfigError)
      expect(() => decodeOne(new Uint8Array([0x90]), -1, 0n, 64)).toThrow(DecoderConfigError)
    })
  })

  describe('instruction streams', () => {
    it('assigns addresses from the base address', () => {
      const addresses = Array.from(
        disassemble(new Uint8Array([0x55, 0x48, 0x89, 0xE5, 0xC3]), { bitness: 64, baseAddress: 0x140001000n }),
        instruction => instruction.address,
      )

      expect(addresses).toEqual([0x140001000n, 0x140001001n, 0x140001004n])
    })

    it('restarts on every iteration', () => {
      const stream = disassemble(new Uint8Array([0x90, 0x0F, 0x05, 0xC3]), { bitness: 64 })

      expect(stream.byteLength).toBe(4)
      expect(Array.from(stream)).toEqual(Array.from(stream))
      expect(Array.from(stream, instruction => instruction.mnemonic)).toEqual(['NOP', 'SYSCALL', 'RET'])
    })

    const bitnesses: Bitness[] = [32, 64]
    for (const bitness of bitnesses) {
      it(`covers random ${bitness}-bit buffers exactly`, () => {
        for (let seed = 1; seed <= 20; seed++) {
          const buffer = randomBytes(seed * 7919, 256)
          const instructions = disassembleAll(buffer, { bitness })

          let offset = 0
          for (const instruction of instructions) {
            expect(instruction.address).toBe(BigInt(offset))
            expect(instruction.length).toBeGreaterThanOrEqual(1)
            expect(instruction.length).toBeLessThanOrEqual(MAX_INSTRUCTION_LENGTH)
            expect(instruction.bytes.length).toBe(instruction.length)
            offset += instruction.length
          }
          expect(offset).toBe(buffer.length)
        }
      })

      it(`decodes random ${bitness}-bit buffers deterministically from any boundary`, () => {
        const buffer = randomBytes(4242 + bitness, 512)
        const instructions = disassembleAll(buffer, { bitness })

        expect(disassembleAll(buffer, { bitness })).toEqual(instructions)
        for (const instruction of instructions) {
          const offset = Number(instruction.address)
          expect(decodeOne(buffer, offset, instruction.address, bitness)).toEqual(instruction)
          expect(decodeOne(buffer.slice(offset), 0, instruction.address, bitness)).toEqual(instruction)
        }
      })
    }
  })
})
