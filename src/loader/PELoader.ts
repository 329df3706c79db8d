import { readFileSync } from 'fs'
import type { Bitness } from '../decoder/types'

export class PEFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PEFormatError'
  }
}

export interface SectionHeader {
  name: string
  virtualSize: number
  virtualAddress: number  // RVA
  sizeOfRawData: number
  pointerToRawData: number
  characteristics: number
}

export interface PEHeader {
  machine: number
  machineName: string
  bitness: Bitness
  numberOfSections: number
  optionalMagic: number
  imageBase: bigint
  entryPoint: bigint  // absolute, imageBase + AddressOfEntryPoint
}

export interface CodeSection {
  name: string
  data: Uint8Array
  virtualAddress: bigint
}

export interface PEImage {
  data: Uint8Array
  header: PEHeader
  sections: SectionHeader[]
  code: CodeSection
}

const IMAGE_FILE_MACHINE_I386 = 0x014C
const IMAGE_FILE_MACHINE_AMD64 = 0x8664
const PE32_MAGIC = 0x010B
const PE32_PLUS_MAGIC = 0x020B
const IMAGE_SCN_CNT_CODE = 0x00000020
const IMAGE_SCN_MEM_EXECUTE = 0x20000000

const DOS_HEADER_SIZE = 0x40
const COFF_HEADER_SIZE = 20
const SECTION_HEADER_SIZE = 40

// Load PE image from file path
export const loadPE = (filepath: string): PEImage => {
  const data = new Uint8Array(readFileSync(filepath))
  return parsePE(data)
}

// Load PE image from ArrayBuffer
export const loadPEFromArrayBuffer = (arrayBuffer: ArrayBuffer): PEImage => {
  const data = new Uint8Array(arrayBuffer)
  return parsePE(data)
}

export const parsePE = (data: Uint8Array): PEImage => {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  const need = (end: number, what: string): void => {
    if (end > data.length) {
      throw new PEFormatError(`file ends inside the ${what} (${data.length} bytes, need ${end})`)
    }
  }

  need(DOS_HEADER_SIZE, 'DOS header')
  if (data[0] !== 0x4D || data[1] !== 0x5A) {
    throw new PEFormatError('missing MZ signature')
  }

  // e_lfanew at 0x3C points at the PE signature
  const peOffset = view.getUint32(0x3C, true)
  need(peOffset + 4 + COFF_HEADER_SIZE, 'COFF header')
  if (view.getUint32(peOffset, true) !== 0x00004550) {
    throw new PEFormatError(`missing PE signature at 0x${peOffset.toString(16)}`)
  }

  const coff = peOffset + 4
  const machine = view.getUint16(coff, true)
  const numberOfSections = view.getUint16(coff + 2, true)
  const sizeOfOptionalHeader = view.getUint16(coff + 16, true)

  const optional = coff + COFF_HEADER_SIZE
  need(optional + Math.max(sizeOfOptionalHeader, 2), 'optional header')
  const optionalMagic = view.getUint16(optional, true)
  let imageBase: bigint
  if (optionalMagic === PE32_MAGIC) {
    need(optional + 32, 'optional header')
    imageBase = BigInt(view.getUint32(optional + 28, true))
  } else if (optionalMagic === PE32_PLUS_MAGIC) {
    need(optional + 32, 'optional header')
    imageBase = view.getBigUint64(optional + 24, true)
  } else {
    throw new PEFormatError(`unknown optional header magic 0x${optionalMagic.toString(16)}`)
  }
  const entryRva = view.getUint32(optional + 16, true)

  const header: PEHeader = {
    machine,
    machineName: getMachineName(machine),
    bitness: bitnessForMachine(machine),
    numberOfSections,
    optionalMagic,
    imageBase,
    entryPoint: imageBase + BigInt(entryRva),
  }

  const sectionTable = optional + sizeOfOptionalHeader
  need(sectionTable + numberOfSections * SECTION_HEADER_SIZE, 'section table')
  const sections: SectionHeader[] = []
  for (let i = 0; i < numberOfSections; i++) {
    sections.push(parseSectionHeader(data, view, sectionTable + i * SECTION_HEADER_SIZE))
  }

  return { data, header, sections, code: extractCode(data, sections, imageBase) }
}

const parseSectionHeader = (data: Uint8Array, view: DataView, offset: number): SectionHeader => {
  // Name is 8 bytes, null-padded
  let name = ''
  for (let i = 0; i < 8; i++) {
    const byte = data[offset + i]
    if (byte === 0) break
    name += String.fromCharCode(byte)
  }

  return {
    name,
    virtualSize: view.getUint32(offset + 8, true),
    virtualAddress: view.getUint32(offset + 12, true),
    sizeOfRawData: view.getUint32(offset + 16, true),
    pointerToRawData: view.getUint32(offset + 20, true),
    characteristics: view.getUint32(offset + 36, true),
  }
}

export const isCodeSection = (section: SectionHeader): boolean =>
  (section.characteristics & (IMAGE_SCN_CNT_CODE | IMAGE_SCN_MEM_EXECUTE)) !== 0

// `.text` when present, otherwise the first section holding code.
export const findCodeSection = (sections: SectionHeader[]): SectionHeader | undefined =>
  sections.find(section => section.name === '.text') ?? sections.find(isCodeSection)

const extractCode = (data: Uint8Array, sections: SectionHeader[], imageBase: bigint): CodeSection => {
  const section = findCodeSection(sections)
  if (section === undefined) {
    throw new PEFormatError('no code section found')
  }

  // Raw data is file-aligned; the virtual size, when set, trims the padding.
  const size = section.virtualSize > 0
    ? Math.min(section.virtualSize, section.sizeOfRawData)
    : section.sizeOfRawData
  if (size === 0) {
    throw new PEFormatError(`section ${section.name} has no raw data`)
  }
  const end = section.pointerToRawData + size
  if (end > data.length) {
    throw new PEFormatError(`section ${section.name} extends past the end of the file`)
  }

  return {
    name: section.name,
    data: data.slice(section.pointerToRawData, end),
    virtualAddress: imageBase + BigInt(section.virtualAddress),
  }
}

export const bitnessForMachine = (machine: number): Bitness => {
  switch (machine) {
    case IMAGE_FILE_MACHINE_I386: return 32
    case IMAGE_FILE_MACHINE_AMD64: return 64
    default:
      throw new PEFormatError(`unsupported machine type 0x${machine.toString(16).toUpperCase().padStart(4, '0')}`)
  }
}

export const getMachineName = (machine: number): string => {
  const machines: Record<number, string> = {
    0x014C: 'i386',
    0x8664: 'AMD64',
    0x01C0: 'ARM',
    0x01C4: 'ARMNT',
    0xAA64: 'ARM64',
    0x0200: 'IA64',
  }

  return machines[machine] || `UNKNOWN (0x${machine.toString(16).toUpperCase().padStart(4, '0')})`
}
