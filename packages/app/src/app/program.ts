import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import { resolveConfig } from "../core/config.js"
import type { AppError, FormattingError, ParsingError } from "../core/errors.js"
import { renderFormattingError, renderParsingError } from "../core/errors.js"
import type { Profile, ProfileName } from "../core/representation.js"
import { narrow, safe, standard } from "../core/representation.js"
import { formatValue, parseFile, writeToFile } from "../shell/codec.js"
import { loadConfigFile } from "../shell/config-file.js"

// CHANGE: orchestrate check/format modes with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(ECMA-404): n/a
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀mode: run(mode) returns exitCode ∈ {0, 1}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly exitCode: number
  readonly output: string
}

type ProgramEnv = FileSystemService | PathService

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const succeeded = (output: string): ProgramResult => ({ exitCode: 0, output })

const failed = (output: string): ProgramResult => ({ exitCode: 1, output })

const writeTo = (stream: NodeJS.WriteStream, payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    stream.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const emitResult = (result: ProgramResult, silent: boolean): Effect.Effect<void> => {
  if (silent) {
    return Effect.void
  }
  return result.exitCode === 0 ? writeTo(process.stdout, result.output) : writeTo(process.stderr, result.output)
}

// Traces share the terminal with `format` output, so they go to stderr.
const traced = <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
  effect.pipe(
    Logger.withMinimumLogLevel(LogLevel.Debug),
    Effect.provide(Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.stringLogger)))
  )

const withProfile = <A, E, R>(
  name: ProfileName,
  use: <I, F>(profile: Profile<I, F>) => Effect.Effect<A, E, R>
): Effect.Effect<A, E, R> =>
  Match.value(name).pipe(
    Match.when("standard", () => use(standard)),
    Match.when("narrow", () => use(narrow)),
    Match.when("safe", () => use(safe)),
    Match.exhaustive
  )

const handleCheck = <I, F>(
  cli: CliArgs,
  profile: Profile<I, F>
): Effect.Effect<ProgramResult, never, ProgramEnv> =>
  parseFile(cli.file, profile).pipe(
    Effect.match({
      onFailure: (error) => failed(renderParsingError(error)),
      onSuccess: () => succeeded(`ok: ${cli.file}`)
    })
  )

const formatTarget = (cli: CliArgs): string | undefined => cli.write ? cli.file : cli.out

const handleFormat = <I, F>(
  cli: CliArgs,
  profile: Profile<I, F>
): Effect.Effect<ProgramResult, never, ProgramEnv> =>
  Effect.gen(function*(_) {
    const value = yield* _(parseFile(cli.file, profile))
    const target = formatTarget(cli)
    if (target === undefined) {
      return succeeded(yield* _(formatValue(value, profile)))
    }
    yield* _(writeToFile(value, target, profile))
    return succeeded(`wrote ${target}`)
  }).pipe(
    Effect.catchTags({
      ParsingError: (error: ParsingError) => Effect.succeed(failed(renderParsingError(error))),
      FormattingError: (error: FormattingError) => Effect.succeed(failed(renderFormattingError(error)))
    })
  )

const executeCommand = (
  cli: CliArgs,
  profileName: ProfileName
): Effect.Effect<ProgramResult, never, ProgramEnv> =>
  Match.value(cli.command).pipe(
    Match.when("check", () =>
      withProfile<ProgramResult, never, ProgramEnv>(
        profileName,
        <I, F>(profile: Profile<I, F>) => handleCheck(cli, profile)
      )),
    Match.when("format", () =>
      withProfile<ProgramResult, never, ProgramEnv>(
        profileName,
        <I, F>(profile: Profile<I, F>) => handleFormat(cli, profile)
      )),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with exit code and the emitted text.
 *
 * @pure false
 * @effect FileSystem, Path, Logger (stderr under --trace)
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    const run = executeCommand(cli, config.profile)
    const result = yield* _(config.trace ? traced(run) : run)
    yield* _(emitResult(result, cli.silent))
    return result
  })
