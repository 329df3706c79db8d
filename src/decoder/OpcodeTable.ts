import type {
  Bitness,
  EscapeMap,
  FixedRegisterName,
  ImmediateClass,
  MandatoryPrefix,
  OpcodeTemplate,
  OperandSpec,
  RegisterClass,
  SizeCode,
  TemplateFlags,
} from './types'
import { OpcodeTableError } from './errors'
import oneByteData from './tables/one-byte.json'
import twoByteData from './tables/two-byte.json'
import threeByte38Data from './tables/three-byte-38.json'
import threeByte3aData from './tables/three-byte-3a.json'
import groupData from './tables/groups.json'

// Opcode maps are kept as small decision trees. Each slot of a map holds the
// node for one opcode byte; interior nodes pick a child from the bits of the
// ModRM byte, the mandatory prefix, REX.W or the processor mode.
export type OpcodeNode =
  | { kind: 'template'; template: OpcodeTemplate }
  | { kind: 'prefix'; none: OpcodeNode | null; variants: Partial<Record<MandatoryPrefix, OpcodeNode | null>> }
  | { kind: 'reg'; slots: ReadonlyArray<OpcodeNode | null> }
  | { kind: 'mod'; memory: OpcodeNode | null; register: OpcodeNode | null }
  | { kind: 'rm'; slots: ReadonlyArray<OpcodeNode | null> }
  | { kind: 'rexw'; clear: OpcodeNode | null; set: OpcodeNode | null }
  | { kind: 'mode'; legacy: OpcodeNode | null; long: OpcodeNode | null }

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const FIXED_REGISTERS: readonly FixedRegisterName[] = [
  'AL', 'CL', 'DL', 'BL', 'AH', 'CH', 'DH', 'BH',
  'AX', 'DX', 'rAX', 'eAX',
  'ES', 'CS', 'SS', 'DS', 'FS', 'GS',
  'ST', 'XMM0',
]

const SIZE_CODES: readonly SizeCode[] = ['b', 'w', 'd', 'q', 'v', 'z', 'y', 'n', 'dq', 'ps', 'pd', 'ss', 'sd', 't', 'p', '']

const FLAG_NAMES: ReadonlyArray<keyof TemplateFlags> = ['d64', 'f64', 'i64', 'o64']

const MANDATORY_PREFIX_KEYS: Partial<Record<string, MandatoryPrefix>> = { '66': 0x66, F2: 0xF2, F3: 0xF3 }

const isFixedRegister = (token: string): token is FixedRegisterName =>
  FIXED_REGISTERS.some(name => name === token)

const isFlagName = (value: string): value is keyof TemplateFlags =>
  FLAG_NAMES.some(name => name === value)

const toSizeCode = (raw: string, where: string): SizeCode => {
  const size = SIZE_CODES.find(code => code === raw)
  if (size === undefined) {
    throw new OpcodeTableError(`${where}: unknown operand size '${raw}'`)
  }
  return size
}

// Addressing-method letters of the Intel opcode-map notation that select the
// ModRM.rm operand, with the register file the register form draws from.
const RM_METHODS: Partial<Record<string, { registerClass: RegisterClass; form: 'any' | 'memory' | 'register' }>> = {
  E: { registerClass: 'gpr', form: 'any' },
  M: { registerClass: 'gpr', form: 'memory' },
  R: { registerClass: 'gpr', form: 'register' },
  W: { registerClass: 'xmm', form: 'any' },
  U: { registerClass: 'xmm', form: 'register' },
  Q: { registerClass: 'mmx', form: 'any' },
  N: { registerClass: 'mmx', form: 'register' },
}

// Letters that select the ModRM.reg operand.
const REG_METHODS: Partial<Record<string, RegisterClass>> = {
  G: 'gpr',
  S: 'segment',
  C: 'control',
  D: 'debug',
  V: 'xmm',
  P: 'mmx',
}

const OPERAND_PATTERN = /^([A-Z])([a-z]*)(?:\/([a-z]+))?$/

export const parseOperandToken = (token: string, where: string): OperandSpec => {
  if (token === '1') return { kind: 'const', value: 1 }
  if (token === 'STi') return { kind: 'st-rm' }
  if (isFixedRegister(token)) return { kind: 'fixed', register: token }

  const match = OPERAND_PATTERN.exec(token)
  if (match === null) {
    throw new OpcodeTableError(`${where}: cannot parse operand '${token}'`)
  }
  const method = match[1]
  const signExtend = method === 'I' && match[2] === 'bs'
  const size = toSizeCode(signExtend ? 'b' : match[2], where)
  const rawRegisterSize: string | undefined = match[3]
  const registerSize = rawRegisterSize === undefined ? size : toSizeCode(rawRegisterSize, where)

  const rmMethod = RM_METHODS[method]
  if (rmMethod !== undefined) {
    return { kind: 'rm', size, registerSize, registerClass: rmMethod.registerClass, form: rmMethod.form }
  }
  const regClass = REG_METHODS[method]
  if (regClass !== undefined) {
    return { kind: 'reg', size, registerClass: regClass }
  }

  switch (method) {
    case 'Z': return { kind: 'opcode-reg', size }
    case 'I': return { kind: 'imm', size, signExtend }
    case 'J': return { kind: 'rel', size }
    case 'O': return { kind: 'moffs', size }
    case 'X': return { kind: 'string', size, role: 'source' }
    case 'Y': return { kind: 'string', size, role: 'destination' }
    case 'A': return { kind: 'far' }
    default:
      throw new OpcodeTableError(`${where}: unknown addressing method '${method}' in '${token}'`)
  }
}

const parseTokenList = (raw: unknown, where: string): string[] => {
  if (raw === undefined) return []
  if (!Array.isArray(raw)) {
    throw new OpcodeTableError(`${where}: operand list must be an array`)
  }
  return raw.map(token => {
    if (typeof token !== 'string') {
      throw new OpcodeTableError(`${where}: operand tokens must be strings`)
    }
    return token
  })
}

const parseFlags = (raw: unknown, where: string): TemplateFlags => {
  const flags: TemplateFlags = { d64: false, f64: false, i64: false, o64: false }
  for (const name of parseTokenList(raw, where)) {
    if (!isFlagName(name)) {
      throw new OpcodeTableError(`${where}: unknown flag '${name}'`)
    }
    flags[name] = true
  }
  return flags
}

const parseSizeMnemonics = (raw: unknown, where: string): Partial<Record<16 | 32 | 64, string>> => {
  const result: Partial<Record<16 | 32 | 64, string>> = {}
  if (raw === undefined) return result
  if (!isRecord(raw)) {
    throw new OpcodeTableError(`${where}: size-dependent mnemonics must be an object`)
  }
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== 'string') {
      throw new OpcodeTableError(`${where}: mnemonic for size ${key} must be a string`)
    }
    if (key === '16') result[16] = value
    else if (key === '32') result[32] = value
    else if (key === '64') result[64] = value
    else throw new OpcodeTableError(`${where}: unknown size key '${key}'`)
  }
  return result
}

const needsModRM = (spec: OperandSpec): boolean =>
  spec.kind === 'rm' || spec.kind === 'reg' || spec.kind === 'st-rm'

const immediateClass = (operands: readonly OperandSpec[]): ImmediateClass => {
  for (const spec of operands) {
    if (spec.kind !== 'imm') continue
    switch (spec.size) {
      case 'b': return { bits: 8, signExtend: spec.signExtend }
      case 'w': return { bits: 16, signExtend: false }
      case 'd': return { bits: 32, signExtend: false }
      case 'q': return { bits: 64, signExtend: false }
      case 'z': return { bits: 'z', signExtend: true }
      case 'v': return { bits: 'v', signExtend: false }
      default: return { bits: 'none', signExtend: false }
    }
  }
  return { bits: 'none', signExtend: false }
}

interface Inherited {
  operands: unknown
  flags: unknown
}

interface Site {
  map: EscapeMap
  opcode: number
  underModRM: boolean
  path: string
}

const MNEMONIC_PATTERN = /^[A-Z][A-Z0-9]*$/

const templateNode = (
  mnemonic: string,
  rawOperands: unknown,
  rawFlags: unknown,
  rawBySize: unknown,
  rawByAddress: unknown,
  site: Site,
): OpcodeNode => {
  if (!MNEMONIC_PATTERN.test(mnemonic)) {
    throw new OpcodeTableError(`${site.path}: bad mnemonic '${mnemonic}'`)
  }
  const operands = parseTokenList(rawOperands, site.path).map(token => parseOperandToken(token, site.path))
  if (operands.length > 4) {
    throw new OpcodeTableError(`${site.path}: ${mnemonic} has more than four operands`)
  }
  const template: OpcodeTemplate = {
    mnemonic,
    operands,
    map: site.map,
    opcode: site.opcode,
    requiresModRM: site.underModRM || operands.some(needsModRM),
    immediate: immediateClass(operands),
    flags: parseFlags(rawFlags, site.path),
    byOperandSize: parseSizeMnemonics(rawBySize, site.path),
    byAddressSize: parseSizeMnemonics(rawByAddress, site.path),
  }
  return { kind: 'template', template: Object.freeze(template) }
}

const parseGroups = (data: unknown): Map<string, unknown[]> => {
  if (!isRecord(data)) {
    throw new OpcodeTableError('groups: table must be an object')
  }
  const groups = new Map<string, unknown[]>()
  for (const [name, slots] of Object.entries(data)) {
    if (!Array.isArray(slots) || slots.length !== 8) {
      throw new OpcodeTableError(`groups/${name}: a group has exactly eight slots`)
    }
    groups.set(name, slots)
  }
  return groups
}

const GROUPS = parseGroups(groupData)

const slotsNode = (kind: 'reg' | 'rm', raw: unknown, inherited: Inherited, site: Site): OpcodeNode => {
  if (!Array.isArray(raw) || raw.length !== 8) {
    throw new OpcodeTableError(`${site.path}: ${kind} split needs eight slots`)
  }
  const slots = raw.map((slot: unknown, index) =>
    buildNode(slot, inherited, { ...site, underModRM: true, path: `${site.path}/${kind}${index}` }))
  return { kind, slots: Object.freeze(slots) }
}

// MMX form without a prefix, SSE2 form under 66.
const mmxPair = (mnemonic: string, trailing: string[], flags: unknown, site: Site): OpcodeNode => ({
  kind: 'prefix',
  none: templateNode(mnemonic, ['Pq', 'Qq', ...trailing], flags, undefined, undefined, site),
  variants: { 0x66: templateNode(mnemonic, ['Vdq', 'Wdq', ...trailing], flags, undefined, undefined, site) },
})

// Shift-by-immediate forms in groups 12 to 14.
const mmxShiftPair = (mnemonic: string, flags: unknown, site: Site): OpcodeNode => ({
  kind: 'prefix',
  none: templateNode(mnemonic, ['Nq', 'Ib'], flags, undefined, undefined, site),
  variants: { 0x66: templateNode(mnemonic, ['Udq', 'Ib'], flags, undefined, undefined, site) },
})

const FLOAT_FORMS = {
  ps: { prefix: null, operands: ['Vps', 'Wps'] },
  pd: { prefix: 0x66, operands: ['Vpd', 'Wpd'] },
  ss: { prefix: 0xF3, operands: ['Vss', 'Wss'] },
  sd: { prefix: 0xF2, operands: ['Vsd', 'Wsd'] },
} as const

const isFloatForm = (value: string): value is keyof typeof FLOAT_FORMS =>
  value === 'ps' || value === 'pd' || value === 'ss' || value === 'sd'

// Packed/scalar single/double family: ADDPS, ADDPD, ADDSS, ADDSD.
const floatFamily = (stem: string, rawForms: unknown, flags: unknown, site: Site): OpcodeNode => {
  const forms = rawForms === undefined ? ['ps', 'pd', 'ss', 'sd'] : parseTokenList(rawForms, site.path)
  const node: { kind: 'prefix'; none: OpcodeNode | null; variants: Partial<Record<MandatoryPrefix, OpcodeNode | null>> } = {
    kind: 'prefix',
    none: null,
    variants: {},
  }
  for (const form of forms) {
    if (!isFloatForm(form)) {
      throw new OpcodeTableError(`${site.path}: unknown floating-point form '${form}'`)
    }
    const { prefix, operands } = FLOAT_FORMS[form]
    const template = templateNode(`${stem}${form.toUpperCase()}`, [...operands], flags, undefined, undefined, site)
    if (prefix === null) node.none = template
    else node.variants[prefix] = template
  }
  return node
}

const buildCore = (raw: Record<string, unknown>, own: Inherited, site: Site): OpcodeNode | null => {
  if (typeof raw.m === 'string') {
    return templateNode(raw.m, own.operands, own.flags, raw.sz, raw.asz, site)
  }
  if (typeof raw.g === 'string') {
    const group = GROUPS.get(raw.g)
    if (group === undefined) {
      throw new OpcodeTableError(`${site.path}: unknown group '${raw.g}'`)
    }
    return slotsNode('reg', group, own, { ...site, path: `${site.path}/${raw.g}` })
  }
  if (raw.ext !== undefined) return slotsNode('reg', raw.ext, own, site)
  if (raw.mem !== undefined || raw.reg !== undefined) {
    const modSite = { ...site, underModRM: true }
    return {
      kind: 'mod',
      memory: buildNode(raw.mem ?? null, own, { ...modSite, path: `${site.path}/mem` }),
      register: buildNode(raw.reg ?? null, own, { ...modSite, path: `${site.path}/reg` }),
    }
  }
  if (raw.rm !== undefined) return slotsNode('rm', raw.rm, own, site)
  if (typeof raw.mx === 'string') return mmxPair(raw.mx, parseTokenList(raw.mxo, site.path), own.flags, site)
  if (typeof raw.mxi === 'string') return mmxShiftPair(raw.mxi, own.flags, site)
  if (typeof raw.fp === 'string') return floatFamily(raw.fp, raw.fpv, own.flags, site)
  return null
}

const buildPrefixSplit = (raw: unknown, core: OpcodeNode | null, own: Inherited, site: Site): OpcodeNode => {
  if (!isRecord(raw)) {
    throw new OpcodeTableError(`${site.path}: prefix variants must be an object`)
  }
  const variants: Partial<Record<MandatoryPrefix, OpcodeNode | null>> = {}
  for (const [key, value] of Object.entries(raw)) {
    const prefix = MANDATORY_PREFIX_KEYS[key]
    if (prefix === undefined) {
      throw new OpcodeTableError(`${site.path}: '${key}' is not a mandatory prefix`)
    }
    variants[prefix] = buildNode(value, own, { ...site, path: `${site.path}/${key}` })
  }
  if (core?.kind === 'prefix') {
    return { kind: 'prefix', none: core.none, variants: { ...core.variants, ...variants } }
  }
  return { kind: 'prefix', none: core, variants }
}

// Children inherit the operand list and flags of the entry that holds them
// unless they name their own.
const buildNode = (raw: unknown, inherited: Inherited, site: Site): OpcodeNode | null => {
  if (raw === null) return null
  if (typeof raw === 'string') {
    return templateNode(raw, inherited.operands, inherited.flags, undefined, undefined, site)
  }
  if (!isRecord(raw)) {
    throw new OpcodeTableError(`${site.path}: entry must be null, a mnemonic or an object`)
  }

  const own: Inherited = {
    operands: raw.o ?? inherited.operands,
    flags: raw.f ?? inherited.flags,
  }
  let node = buildCore(raw, own, site)
  if (raw.w !== undefined) {
    node = { kind: 'rexw', clear: node, set: buildNode(raw.w, own, { ...site, path: `${site.path}/w` }) }
  }
  if (raw.p !== undefined) {
    node = buildPrefixSplit(raw.p, node, own, site)
  }
  if (raw.x64 !== undefined) {
    node = { kind: 'mode', legacy: node, long: buildNode(raw.x64, own, { ...site, path: `${site.path}/x64` }) }
  }
  return node
}

const OPCODE_KEY = /^[0-9A-F]{2}$/

const buildMap = (data: unknown, map: EscapeMap): ReadonlyArray<OpcodeNode | null> => {
  if (!isRecord(data)) {
    throw new OpcodeTableError(`${map}: table must be an object`)
  }
  const slots = new Array<OpcodeNode | null>(256).fill(null)
  for (const [key, raw] of Object.entries(data)) {
    if (!OPCODE_KEY.test(key)) {
      throw new OpcodeTableError(`${map}: bad opcode key '${key}'`)
    }
    const opcode = parseInt(key, 16)
    slots[opcode] = buildNode(raw, { operands: undefined, flags: undefined }, {
      map,
      opcode,
      underModRM: false,
      path: `${map}/${key}`,
    })
  }
  return Object.freeze(slots)
}

export const loadOpcodeMap = (data: unknown, map: EscapeMap): ReadonlyArray<OpcodeNode | null> =>
  buildMap(data, map)

const TABLES: Readonly<Record<EscapeMap, ReadonlyArray<OpcodeNode | null>>> = Object.freeze({
  'one-byte': buildMap(oneByteData, 'one-byte'),
  '0f': buildMap(twoByteData, '0f'),
  '0f38': buildMap(threeByte38Data, '0f38'),
  '0f3a': buildMap(threeByte3aData, '0f3a'),
})

export interface OpcodeSelector {
  bitness: Bitness
  rexW: boolean
  repeat: 'rep' | 'repne' | null
  operandSizePrefix: boolean
  // Returns the ModRM byte, reading it on first use; undefined when there is none.
  modrm: () => number | undefined
}

export interface ResolvedOpcode {
  template: OpcodeTemplate
  mandatoryPrefix: MandatoryPrefix | null
}

// F3/F2 win over 66 when the entry has a form for them; a prefix the entry
// has no form for stays an ordinary prefix.
const pickPrefixVariant = (
  node: { none: OpcodeNode | null; variants: Partial<Record<MandatoryPrefix, OpcodeNode | null>> },
  selector: OpcodeSelector,
): { node: OpcodeNode | null; prefix: MandatoryPrefix | null } => {
  const repeatByte: MandatoryPrefix | null =
    selector.repeat === 'rep' ? 0xF3 : selector.repeat === 'repne' ? 0xF2 : null
  if (repeatByte !== null) {
    const variant = node.variants[repeatByte]
    if (variant !== undefined) return { node: variant, prefix: repeatByte }
  }
  if (selector.operandSizePrefix) {
    const variant = node.variants[0x66]
    if (variant !== undefined) return { node: variant, prefix: 0x66 }
  }
  return { node: node.none, prefix: null }
}

export const resolveOpcode = (map: EscapeMap, opcode: number, selector: OpcodeSelector): ResolvedOpcode | undefined => {
  let node: OpcodeNode | null = TABLES[map][opcode] ?? null
  let mandatoryPrefix: MandatoryPrefix | null = null

  while (node !== null) {
    switch (node.kind) {
      case 'template':
        return { template: node.template, mandatoryPrefix }
      case 'prefix': {
        const picked = pickPrefixVariant(node, selector)
        if (picked.prefix !== null) mandatoryPrefix = picked.prefix
        node = picked.node
        break
      }
      case 'reg':
      case 'rm': {
        const modrm = selector.modrm()
        if (modrm === undefined) return undefined
        const index = node.kind === 'reg' ? (modrm >> 3) & 7 : modrm & 7
        node = node.slots[index] ?? null
        break
      }
      case 'mod': {
        const modrm = selector.modrm()
        if (modrm === undefined) return undefined
        node = (modrm >> 6) === 3 ? node.register : node.memory
        break
      }
      case 'rexw':
        node = selector.rexW ? node.set : node.clear
        break
      case 'mode':
        node = selector.bitness === 64 ? node.long : node.legacy
        break
    }
  }
  return undefined
}

export interface LookupOptions {
  bitness?: Bitness
  mandatoryPrefix?: MandatoryPrefix | null
  rexW?: boolean
}

// Template for an opcode byte in one of the escape maps. `modrm` is the whole
// ModRM byte; entries that split on it return undefined when it is omitted.
export const lookup = (
  map: EscapeMap,
  opcode: number,
  modrm?: number,
  options: LookupOptions = {},
): OpcodeTemplate | undefined => {
  if (!Number.isInteger(opcode) || opcode < 0 || opcode > 0xFF) return undefined
  const prefix = options.mandatoryPrefix ?? null
  return resolveOpcode(map, opcode, {
    bitness: options.bitness ?? 64,
    rexW: options.rexW ?? false,
    repeat: prefix === 0xF3 ? 'rep' : prefix === 0xF2 ? 'repne' : null,
    operandSizePrefix: prefix === 0x66,
    modrm: () => modrm,
  })?.template
}

// Number of opcode bytes in a map with at least one entry.
export const definedOpcodeCount = (map: EscapeMap): number =>
  TABLES[map].filter(node => node !== null).length
