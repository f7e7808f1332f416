import { Match } from "effect"
import * as Either from "effect/Either"

import type { ProfileName } from "./representation.js"
import { isProfileName, profileNames } from "./representation.js"

// CHANGE: implement deterministic CLI parsing for json-codec
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(ECMA-404): n/a
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.file ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and extra positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "check" | "format"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string
  readonly profile: ProfileName | undefined
  readonly trace: boolean | undefined
  readonly silent: boolean
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly out: string | undefined
  readonly write: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

export const defaultConfigPath = "./.json-codec.json"

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const parseProfile = (value: string): Either.Either<ProfileName, CliError> =>
  isProfileName(value)
    ? Either.right(value)
    : Either.left(cliError(`Unknown profile: ${value} (expected one of ${profileNames.join(", ")})`))

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  file: "",
  profile: undefined,
  trace: undefined,
  silent: false,
  configPath: defaultConfigPath,
  configPathExplicit: false,
  out: undefined,
  write: false
})

type FlagStep = Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError>

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliArgs, consumed: number): FlagStep => Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): FlagStep =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => FlagStep

const flagParsers: Record<string, FlagParser> = {
  trace: (current) => setParsedFlag({ ...current, trace: true }, 1),
  "no-trace": (current) => setParsedFlag({ ...current, trace: false }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  write: (current) => setParsedFlag({ ...current, write: true }, 1),
  profile: (current, inlineValue, nextValue) =>
    parseValueFlag("profile", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseProfile(value), (profile) => ({ ...args, profile }))),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({ ...args, configPath: value, configPathExplicit: true })),
  out: (current, inlineValue, nextValue) =>
    parseValueFlag("out", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, out: value }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): FlagStep => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = Object.hasOwn(flagParsers, name) ? flagParsers[name] : undefined
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parseArguments = (
  rawArgs: ReadonlyArray<string>,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = 1
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      if (args.file !== "") {
        return Either.left(cliError(`Unexpected positional argument: ${current}`))
      }
      args = { ...args, file: current }
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  if (args.file === "") {
    return Either.left(cliError("Missing input file"))
  }
  if (args.write && args.out !== undefined) {
    return Either.left(cliError("--write and --out cannot be combined"))
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant exactly one input file is named
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.left(cliError("Missing command (expected check or format)"))
  }
  return Either.flatMap(parseCommand(first), (command) => parseArguments(rawArgs, defaultArgs(command)))
}
