const SUBCOMMANDS = new Set(["pick", "config"])
const ROOT_FLAGS = new Set(["--help", "-h", "--version", "--wizard", "--completions"])

/** `pickpane a b c` and `ls | pickpane --multi` mean `pickpane pick ...`. */
export const withDefaultSubcommand = (argv: readonly string[]): string[] => {
  const first = argv[2]
  if (first != null && (SUBCOMMANDS.has(first) || ROOT_FLAGS.has(first))) return [...argv]
  return [...argv.slice(0, 2), "pick", ...argv.slice(2)]
}
