import { appendFileSync } from "node:fs"

export interface MenuLogger {
  debug(event: string, payload?: Record<string, unknown>): void
}

export interface DebugLoggerOptions {
  readonly enabled?: boolean
  readonly filePath?: string | null
  readonly sink?: (line: string) => void
}

export const NOOP_LOGGER: MenuLogger = {
  debug: () => undefined,
}

/**
 * JSON-lines debug log, off unless `PICKPANE_DEBUG=1`. While the menu owns the
 * screen stderr output lands on top of it, so `PICKPANE_DEBUG_FILE` redirects
 * the lines into a file instead.
 */
export const createDebugLogger = (options: DebugLoggerOptions = {}, env: NodeJS.ProcessEnv = process.env): MenuLogger => {
  const enabled = options.enabled ?? env.PICKPANE_DEBUG === "1"
  if (!enabled) return NOOP_LOGGER
  const filePath = options.filePath ?? (env.PICKPANE_DEBUG_FILE?.trim() || null)
  const sink =
    options.sink ??
    (filePath ? (line: string) => appendFileSync(filePath, `${line}\n`, "utf8") : (line: string) => console.error(line))
  return {
    debug: (event, payload = {}) => {
      sink(JSON.stringify({ ts: Date.now(), event, ...payload }))
    },
  }
}
