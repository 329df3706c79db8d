export * from './decoder/types'
export {
  DecoderConfigError,
  OpcodeTableError,
  NotEnoughBytesError,
  InvalidEncodingError,
} from './decoder/errors'
export { lookup, definedOpcodeCount } from './decoder/OpcodeTable'
export type { LookupOptions } from './decoder/OpcodeTable'
export { scanPrefixes, emptyPrefixState } from './decoder/PrefixScanner'
export type { PrefixScan } from './decoder/PrefixScanner'
export {
  createDecodeContext,
  decodeOne,
  disassemble,
  disassembleAll,
  effectiveAddress,
  branchTarget,
  relativeTarget,
  MAX_INSTRUCTION_LENGTH,
} from './decoder/InstructionDecoder'
export type { DecodeContext, DecodeOptions, InstructionStream } from './decoder/InstructionDecoder'
export { formatInstruction, formatHex, isSyntax, BAD_INSTRUCTION } from './formatter/Formatter'
export type { Syntax, FormattedInstruction } from './formatter/Formatter'
export { formatListing, formatListingLine, formatAddress, listingStats } from './formatter/Listing'
export type { ListingOptions, ListingStats } from './formatter/Listing'
export { loadPE, loadPEFromArrayBuffer, parsePE, PEFormatError } from './loader/PELoader'
export type { PEImage, PEHeader, SectionHeader, CodeSection } from './loader/PELoader'
export { generateReportHtml, renderReport } from './report/HtmlReport'
export type { ReportOptions } from './report/HtmlReport'
