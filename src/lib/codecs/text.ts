/**
 * Byte-order-mark aware text decoding for imported files
 */

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf])
const UTF16LE_BOM = Buffer.from([0xff, 0xfe])

export function decodeText(bytes: Buffer | string): string {
  if (typeof bytes === 'string') {
    return bytes.replace(/^\uFEFF/, '')
  }
  if (bytes.subarray(0, 2).equals(UTF16LE_BOM)) {
    return bytes.subarray(2).toString('utf16le')
  }
  if (bytes.subarray(0, 3).equals(UTF8_BOM)) {
    return bytes.subarray(3).toString('utf-8')
  }
  return bytes.toString('utf-8')
}

export { UTF16LE_BOM }
