import type { CliArgs } from "./cli.js"

// CHANGE: define config merging rules and defaults for jsonval
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "Precedence CLI flags > config file > defaults"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved indent is a non-negative integer
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly indent?: number
  readonly ascii?: boolean
  readonly encoding?: string
}

export interface ResolvedConfig {
  readonly indent: number
  readonly ascii: boolean
  readonly encoding: string
}

export const defaultConfig: ResolvedConfig = {
  indent: 2,
  ascii: false,
  encoding: "utf-8"
}

export const defaultConfigFile = ".jsonvalrc.json"

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .jsonvalrc.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  indent: cli.indent ?? fileConfig?.indent ?? defaultConfig.indent,
  ascii: cli.ascii ?? fileConfig?.ascii ?? defaultConfig.ascii,
  encoding: cli.encoding ?? fileConfig?.encoding ?? defaultConfig.encoding
})
