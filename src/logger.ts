/**
 * Logger
 *
 * Console logging with quiet/verbose levels. Library modules take an
 * optional Logger and stay silent without one.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  error: (msg: string) => void
}

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  return {
    log: (msg: string) => {
      if (!quiet) console.log(msg)
    },
    verbose: (msg: string) => {
      if (verbose) console.log(`  [debug] ${msg}`)
    },
    success: (msg: string) => {
      if (!quiet) console.log(`  ✓ ${msg}`)
    },
    error: (msg: string) => {
      console.error(`  ✗ ${msg}`)
    }
  }
}
