function readDebugFlag(): boolean {
  const env = import.meta.env
  return env.DEV === true || env.VITE_DEBUG_LOGS === 'true' || env.VITE_DEBUG === 'true'
}

const debugEnabled = readDebugFlag()

export type ErrorReporter = (error: unknown, context?: Record<string, unknown>) => void

let errorReporter: ErrorReporter | null = null

export function setErrorReporter(reporter: ErrorReporter | null): void {
  errorReporter = reporter
}

export function debugLog(...args: unknown[]): void {
  if (debugEnabled) console.log(...args)
}

export function debugWarn(...args: unknown[]): void {
  if (debugEnabled) console.warn(...args)
}

export function logError(...args: unknown[]): void {
  console.error(...args)
  if (errorReporter) {
    // Forward a summary only; arbitrary args may hold user text.
    const [first] = args
    const error =
      first instanceof Error ? first : new Error(typeof first === 'string' ? first : 'Unknown error')
    errorReporter(error, { args: args.map((a) => (typeof a === 'string' ? a : typeof a)) })
  }
}
