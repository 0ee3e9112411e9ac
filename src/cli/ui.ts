/**
 * CLI UI utilities - TTY-aware output
 *
 * - TTY (interactive): tables, colors, progress messages on stderr
 * - Pipe: data only on stdout
 */

import { Table, renderToString } from 'tuiuiu.js'

const isTTY = process.stdout.isTTY ?? false

/**
 * Output data to stdout (for pipes). Only this and outputRaw write to stdout.
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Raw bytes to stdout (binary exports such as UTF-16 .reg files)
 */
export function outputRaw(data: string | Buffer): void {
  process.stdout.write(data)
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  if (isTTY) {
    console.error(message)
  }
}

export function verbose(message: string, enabled: boolean): void {
  if (enabled) {
    console.error(`[winenv] ${message}`)
  }
}

/**
 * Format data as a table using tuiuiu.js
 */
export function formatTable(
  columns: Array<{ key: string; header: string; align?: 'left' | 'center' | 'right' }>,
  data: Array<Record<string, string>>,
  options: { borderStyle?: 'single' | 'round' | 'ascii' | 'none' } = {}
): string {
  if (!isTTY) {
    // Tab-separated for pipes
    const headers = columns.map(c => c.header).join('\t')
    const rows = data.map(row => columns.map(c => row[c.key] ?? '').join('\t'))
    return [headers, ...rows].join('\n')
  }

  const table = Table({
    columns: columns.map(c => ({
      key: c.key,
      header: c.header,
      align: c.align || 'left'
    })),
    data,
    borderStyle: options.borderStyle || 'round',
    showHeader: true
  })

  return renderToString(table)
}

