import type { CliArgs } from "./cli.js"
import type { ProfileName } from "./representation.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override the config file and defaults deterministically
// QUOTE(ECMA-404): n/a
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved profile is always a known profile name
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly profile?: ProfileName
  readonly trace?: boolean
}

export interface ResolvedConfig {
  readonly profile: ProfileName
  readonly trace: boolean
}

export const defaultProfile: ProfileName = "standard"

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-codec.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  profile: cli.profile ?? fileConfig?.profile ?? defaultProfile,
  trace: cli.trace ?? fileConfig?.trace ?? false
})
