import * as prettier from 'prettier'
import type { Instruction } from '../decoder/types'
import { formatInstruction } from '../formatter/Formatter'
import type { Syntax } from '../formatter/Formatter'
import { formatAddress, listingStats } from '../formatter/Listing'

export interface ReportOptions {
  title: string
  syntax?: Syntax
}

const HEX_ROW_BYTES = 16

export const escapeHtml = (text: string): string =>
  text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')

const listingRows = (instructions: Instruction[], syntax: Syntax): string =>
  instructions
    .map(instruction => {
      const { text, hex } = formatInstruction(instruction, syntax)
      const rowClass = instruction.valid ? '' : ' class="bad"'
      return `<tr${rowClass}><td>${formatAddress(instruction.address, instruction.bitness)}</td><td>${hex}</td><td>${escapeHtml(text)}</td></tr>`
    })
    .join('\n')

// Classic 16-bytes-per-row dump of the bytes the listing covers.
const hexRows = (instructions: Instruction[]): string => {
  if (instructions.length === 0) return ''
  const first = instructions[0]
  const bytes = instructions.flatMap(instruction => Array.from(instruction.bytes))
  const rows: string[] = []
  for (let offset = 0; offset < bytes.length; offset += HEX_ROW_BYTES) {
    const chunk = bytes.slice(offset, offset + HEX_ROW_BYTES)
    const hex = chunk.map(byte => byte.toString(16).padStart(2, '0')).join(' ')
    const ascii = chunk.map(byte => (byte >= 0x20 && byte < 0x7F ? String.fromCharCode(byte) : '.')).join('')
    const address = formatAddress(first.address + BigInt(offset), first.bitness)
    rows.push(`<tr><td>${address}</td><td>${hex}</td><td>${escapeHtml(ascii)}</td></tr>`)
  }
  return rows.join('\n')
}

export const generateReportHtml = (instructions: Iterable<Instruction>, options: ReportOptions): string => {
  const listed = Array.from(instructions)
  const stats = listingStats(listed)
  const syntax = options.syntax ?? 'intel'
  const title = escapeHtml(options.title)

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${title}</title>
<style>
body { font-family: monospace; margin: 20px; background: #1e1e1e; color: #ddd; }
.panes { display: flex; gap: 24px; align-items: flex-start; }
table { border-collapse: collapse; }
td { padding: 0 12px 0 0; white-space: pre; }
tr.bad td { color: #e06c75; }
</style>
</head>
<body>
<h1>${title}</h1>
<p class="summary">${stats.instructions} instructions, ${stats.invalid} undecodable, ${stats.bytes} bytes (${syntax} syntax)</p>
<div class="panes">
<section>
<h2>Listing</h2>
<table class="listing">
${listingRows(listed, syntax)}
</table>
</section>
<section>
<h2>Bytes</h2>
<table class="hex">
${hexRows(listed)}
</table>
</section>
</div>
</body>
</html>
`
}

// Formatted with Prettier; the raw page is returned if formatting fails.
export const renderReport = async (instructions: Iterable<Instruction>, options: ReportOptions): Promise<string> => {
  const html = generateReportHtml(instructions, options)
  try {
    return await prettier.format(html, { parser: 'html' })
  } catch (error) {
    console.warn('Failed to format HTML with Prettier:', error)
    return html
  }
}
