type Stream = NodeJS.WriteStream

function writeLine(stream: Stream, prefix: string, message: string): void {
  stream.write(`${prefix}${message}\n`)
}

/**
 * Plain-text CLI output. Results go to stdout; errors, warnings and traced
 * SQL go to stderr so they can be separated from results in a pipe.
 */
export const output = {
  info(message: string): void {
    writeLine(process.stdout, '', message)
  },

  success(message: string): void {
    writeLine(process.stdout, 'OK: ', message)
  },

  error(message: string): void {
    writeLine(process.stderr, 'Error: ', message)
  },

  warn(message: string): void {
    writeLine(process.stderr, 'Warning: ', message)
  },

  /** Trace hook for a connection: one executed statement per line. */
  trace(sql: string): void {
    writeLine(process.stderr, 'SQL: ', sql.trim())
  },
}
