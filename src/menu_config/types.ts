import type { ScreenSide } from "../menu/types.js"
import type { ColorMode } from "../theme.js"

export interface MenuConfigInput {
  display?: {
    asciiOnly?: boolean
    colorMode?: ColorMode
  }
  icons?: {
    item?: string
    chosen?: string
  }
  preview?: {
    side?: ScreenSide
    width?: number
    label?: string
  }
  layout?: {
    boxed?: boolean
  }
  selection?: {
    multiselect?: boolean
  }
  /** Key codes; files may spell keys as names ("down", "ctrl+n"), single characters or codes. */
  keys?: {
    moveUp?: number[]
    moveDown?: number[]
    select?: number[]
    toggleSelect?: number[]
  }
}

export interface ResolvedMenuConfig {
  readonly display: {
    readonly asciiOnly: boolean
    readonly colorMode: ColorMode
  }
  readonly icons: {
    readonly item: string
    readonly chosen: string
  }
  readonly preview: {
    readonly side: ScreenSide
    readonly width: number
    readonly label: string
  }
  readonly layout: {
    readonly boxed: boolean
  }
  readonly selection: {
    readonly multiselect: boolean
  }
  /** Extra key codes per action, added on top of the built-in bindings. */
  readonly keys: {
    readonly moveUp: readonly number[]
    readonly moveDown: readonly number[]
    readonly select: readonly number[]
    readonly toggleSelect: readonly number[]
  }
  readonly meta: {
    readonly strict: boolean
    readonly warnings: readonly string[]
    readonly sources: readonly string[]
  }
}

export interface ResolveMenuConfigOptions {
  readonly workspace?: string | null
  readonly cliConfigPath?: string | null
  readonly cliStrict?: boolean
  readonly colorAllowed?: boolean
  readonly env?: NodeJS.ProcessEnv
  readonly homeDir?: string
}
