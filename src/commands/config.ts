import { Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { stringify } from "yaml"
import { resolveMenuConfig } from "../menu_config/load.js"
import type { ResolvedMenuConfig } from "../menu_config/types.js"
import { describeKey } from "../terminal/keyCodes.js"

const workspaceOption = Options.text("workspace").pipe(Options.optional)
const configOption = Options.text("config").pipe(Options.optional)
const configStrictOption = Options.boolean("config-strict").pipe(Options.optional)
const outputOption = Options.choice("output", ["json", "yaml", "summary"] as const).pipe(Options.withDefault("json"))

const describeKeys = (codes: readonly number[]): string =>
  codes.length > 0 ? codes.map(describeKey).join(", ") : "(defaults only)"

export const formatConfigSummary = (resolved: ResolvedMenuConfig): string[] => {
  const lines = [
    "Effective menu config",
    `display.asciiOnly: ${resolved.display.asciiOnly}`,
    `display.colorMode: ${resolved.display.colorMode}`,
    `icons.item: ${resolved.icons.item}`,
    `icons.chosen: ${resolved.icons.chosen}`,
    `preview.side: ${resolved.preview.side}`,
    `preview.width: ${resolved.preview.width}`,
    `preview.label: ${JSON.stringify(resolved.preview.label)}`,
    `layout.boxed: ${resolved.layout.boxed}`,
    `selection.multiselect: ${resolved.selection.multiselect}`,
    `keys.moveUp: ${describeKeys(resolved.keys.moveUp)}`,
    `keys.moveDown: ${describeKeys(resolved.keys.moveDown)}`,
    `keys.select: ${describeKeys(resolved.keys.select)}`,
    `keys.toggleSelect: ${describeKeys(resolved.keys.toggleSelect)}`,
    `meta.strict: ${resolved.meta.strict}`,
    `meta.sources: ${resolved.meta.sources.join(" -> ")}`,
  ]
  if (resolved.meta.warnings.length > 0) {
    lines.push("meta.warnings:")
    for (const warning of resolved.meta.warnings) {
      lines.push(`- ${warning}`)
    }
  }
  return lines
}

export const configCommand = Command.make(
  "config",
  {
    workspace: workspaceOption,
    config: configOption,
    configStrict: configStrictOption,
    output: outputOption,
  },
  ({ workspace, config, configStrict, output }) =>
    Effect.gen(function* () {
      const resolved = yield* Effect.tryPromise({
        try: () =>
          resolveMenuConfig({
            workspace: Option.getOrNull(workspace) ?? process.cwd(),
            cliConfigPath: Option.getOrNull(config),
            cliStrict: Option.getOrUndefined(configStrict),
          }),
        catch: (error) => (error instanceof Error ? error : new Error(String(error))),
      }).pipe(Effect.tapError((error) => Console.error(error.message)))

      if (output === "yaml") {
        yield* Console.log(stringify(resolved))
        return
      }
      if (output === "summary") {
        for (const line of formatConfigSummary(resolved)) {
          yield* Console.log(line)
        }
        return
      }
      yield* Console.log(JSON.stringify(resolved, null, 2))
    }),
)
