#!/usr/bin/env node
import { loadPE } from '../loader/PELoader'
import { disassemble } from '../decoder/InstructionDecoder'
import { isSyntax } from '../formatter/Formatter'
import { formatListing, listingStats } from '../formatter/Listing'

const main = (): void => {
  const pePath = process.argv[2]
  const syntax = process.argv[3] || 'intel'
  const count = parseInt(process.argv[4] || '0', 10)

  if (!pePath) {
    console.error('Usage: npm run disasm <pe-file> [intel|att] [count]')
    console.error('Example: npm run disasm hello.exe att 40')
    process.exit(1)
  }
  if (!isSyntax(syntax)) {
    console.error(`Unknown syntax '${syntax}', expected intel or att`)
    process.exit(1)
  }

  try {
    const image = loadPE(pePath)
    const { header, code } = image

    console.log(`📋 ${pePath}`)
    console.log(`  Machine: ${header.machineName} (${header.bitness}-bit)`)
    console.log(`  Image base: 0x${header.imageBase.toString(16)}`)
    console.log(`  Entry point: 0x${header.entryPoint.toString(16)}`)
    console.log(`  Code section: ${code.name}, ${code.data.length} bytes at 0x${code.virtualAddress.toString(16)}\n`)

    const stream = disassemble(code.data, { bitness: header.bitness, baseAddress: code.virtualAddress })
    for (const line of formatListing(stream, { syntax, limit: count > 0 ? count : undefined })) {
      console.log(line)
    }

    const stats = listingStats(stream)
    console.log(`\n📊 ${stats.instructions} instructions, ${stats.invalid} undecodable, ${stats.bytes} bytes`)
  } catch (error) {
    console.error('\n❌ Error:', error instanceof Error ? error.message : String(error))
    process.exit(1)
  }
}

main()
