#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { withDefaultSubcommand } from "./commands/argv.js"
import { configCommand } from "./commands/config.js"
import { pickCommand } from "./commands/pick.js"

const root = Command.make("pickpane", {}, () => Effect.succeed(undefined)).pipe(
  Command.withSubcommands([pickCommand, configCommand]),
)

const cli = Command.run(root, { name: "pickpane", version: "0.1.0" })

cli(withDefaultSubcommand(process.argv)).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
