import { Args, Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { MenuConfigError, TerminalError } from "../menu/errors.js"
import { OUTPUT_MODES, runPick } from "./pickLogic.js"

const itemsArg = Args.text({ name: "items" }).pipe(Args.repeated)
const fileOption = Options.text("file").pipe(Options.withDescription("Read items from a file, one per line"), Options.optional)
const rangeOption = Options.text("range").pipe(
  Options.withDescription("Numbers from start up to (not including) end; omit end for an endless list"),
  Options.optional,
)
const titleOption = Options.text("title").pipe(Options.optional)
const multiOption = Options.boolean("multi").pipe(Options.withDescription("Toggle several items with space"))
const boxedOption = Options.boolean("boxed")
const previewFileOption = Options.boolean("preview-file").pipe(
  Options.withDescription("Preview the file each item names"),
)
const previewSideOption = Options.choice("preview-side", ["top", "bottom", "left", "right"] as const).pipe(
  Options.optional,
)
const previewWidthOption = Options.float("preview-width").pipe(Options.optional)
const previewLabelOption = Options.text("preview-label").pipe(Options.optional)
const configOption = Options.text("config").pipe(Options.optional)
const workspaceOption = Options.text("workspace").pipe(Options.optional)
const outputOption = Options.choice("output", OUTPUT_MODES).pipe(Options.withDefault("indices" as const))

const describeFailure = (error: unknown): string => {
  if (error instanceof MenuConfigError) return `Invalid menu setting ${error.message}`
  if (error instanceof TerminalError) return `Terminal error: ${error.message}`
  return error instanceof Error ? error.message : String(error)
}

export const pickCommand = Command.make(
  "pick",
  {
    items: itemsArg,
    file: fileOption,
    range: rangeOption,
    title: titleOption,
    multi: multiOption,
    boxed: boxedOption,
    previewFile: previewFileOption,
    previewSide: previewSideOption,
    previewWidth: previewWidthOption,
    previewLabel: previewLabelOption,
    config: configOption,
    workspace: workspaceOption,
    output: outputOption,
  },
  ({ items, file, range, title, multi, boxed, previewFile, previewSide, previewWidth, previewLabel, config, workspace, output }) =>
    Effect.gen(function* () {
      const result = yield* Effect.tryPromise({
        try: () =>
          runPick({
            items,
            file: Option.getOrNull(file),
            range: Option.getOrNull(range),
            title: Option.getOrNull(title),
            multi,
            boxed,
            previewFile,
            previewSide: Option.getOrNull(previewSide),
            previewWidth: Option.getOrNull(previewWidth),
            previewLabel: Option.getOrNull(previewLabel),
            configPath: Option.getOrNull(config),
            workspace: Option.getOrNull(workspace),
            output,
          }),
        catch: (error) => (error instanceof Error ? error : new Error(String(error))),
      }).pipe(Effect.tapError((error) => Console.error(describeFailure(error))))

      for (const warning of result.warnings) {
        yield* Console.error(`warning: ${warning}`)
      }
      for (const line of result.lines) {
        yield* Console.log(line)
      }
    }),
)
