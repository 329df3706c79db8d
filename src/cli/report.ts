#!/usr/bin/env node
import { writeFileSync } from 'fs'
import { basename } from 'path'
import { loadPE } from '../loader/PELoader'
import { disassemble } from '../decoder/InstructionDecoder'
import { isSyntax } from '../formatter/Formatter'
import { renderReport } from '../report/HtmlReport'

const main = async (): Promise<void> => {
  const pePath = process.argv[2]
  const outputPath = process.argv[3] || './disassembly.html'
  const syntax = process.argv[4] || 'intel'

  if (!pePath) {
    console.error('Usage: npm run report <pe-file> [output.html] [intel|att]')
    console.error('Example: npm run report hello.exe ./hello.html')
    process.exit(1)
  }
  if (!isSyntax(syntax)) {
    console.error(`Unknown syntax '${syntax}', expected intel or att`)
    process.exit(1)
  }

  console.log(`Loading PE image: ${pePath}`)
  const { header, code } = loadPE(pePath)
  const stream = disassemble(code.data, { bitness: header.bitness, baseAddress: code.virtualAddress })

  console.log(`\n🔍 Disassembling ${code.name} (${code.data.length} bytes, ${header.bitness}-bit)...`)
  const html = await renderReport(stream, { title: `${basename(pePath)} ${code.name}`, syntax })
  writeFileSync(outputPath, html)

  console.log(`\n✅ Wrote ${outputPath}`)
  console.log(`   Size: ${(html.length / 1024).toFixed(2)} KB`)
}

main().catch(error => {
  console.error('\n❌ Error:', error instanceof Error ? error.message : String(error))
  process.exit(1)
})
