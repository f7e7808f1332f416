import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for parsing, formatting and interface misuse
// WHY: keep malformed input, unrepresentable values and caller bugs in disjoint channels
// QUOTE(ECMA-404): "A conforming JSON text is a sequence of Unicode code points"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ CodecError: e._tag ∈ {ParsingError, FormattingError, InterfaceMisuse}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every kind belongs to exactly one taxonomy
// COMPLEXITY: O(1)/O(1)

export interface SourceLocation {
  readonly line: number
  readonly column: number
}

export type ParsingErrorKind =
  | "UNKNOWN_TOKEN"
  | "UNEXPECTED_TOKEN"
  | "UNEXPECTED_SOURCE_END"
  | "FILE_NOT_FOUND"
  | "FILE_READ_ERROR"
  | "INCORRECT_FILE_EXTENSION"
  | "ILLEGAL_CODE_POINT"
  | "BAD_REVERSE_SOLIDUS"
  | "INCORRECT_NUMBER_FORMAT"
  | "STRING_TYPE_TOO_NARROW"
  | "INTEGER_TYPE_TOO_NARROW"
  | "FLOATING_POINT_TYPE_TOO_NARROW"

export type FormattingErrorKind = "ILLEGAL_CODE_POINT" | "CONVERSION_FAILURE" | "FILE_WRITE_ERROR"

export type InterfaceMisuseKind = "INCORRECT_TYPE" | "INDEX_OUT_OF_RANGE" | "NO_SUCH_KEY" | "ILLEGAL_OPERAND"

export type ParsingError = {
  readonly _tag: "ParsingError"
  readonly kind: ParsingErrorKind
  readonly location: SourceLocation | undefined
  readonly message: string
}

export type FormattingError = {
  readonly _tag: "FormattingError"
  readonly kind: FormattingErrorKind
  readonly message: string
}

export type InterfaceMisuse = {
  readonly _tag: "InterfaceMisuse"
  readonly kind: InterfaceMisuseKind
  readonly message: string
}

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | ParsingError
  | FormattingError

export const parsingError = (
  kind: ParsingErrorKind,
  message: string,
  location?: SourceLocation
): ParsingError => ({
  _tag: "ParsingError",
  kind,
  location,
  message
})

export const formattingError = (kind: FormattingErrorKind, message: string): FormattingError => ({
  _tag: "FormattingError",
  kind,
  message
})

export const interfaceMisuse = (kind: InterfaceMisuseKind, message: string): InterfaceMisuse => ({
  _tag: "InterfaceMisuse",
  kind,
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

const renderLocation = (location: SourceLocation | undefined): string =>
  location === undefined ? "" : ` (line ${location.line}, column ${location.column})`

/**
 * Render a parsing error as a single human-readable line.
 *
 * @param error - Parsing error produced by the tokenizer, parser or file reader.
 * @returns "<KIND>: <message>" followed by the location when one is known.
 *
 * @pure true
 * @invariant output starts with error.kind
 * @complexity O(1)
 */
export const renderParsingError = (error: ParsingError): string =>
  `${error.kind}: ${error.message}${renderLocation(error.location)}`

export const renderFormattingError = (error: FormattingError): string => `${error.kind}: ${error.message}`

export const renderInterfaceMisuse = (error: InterfaceMisuse): string => `${error.kind}: ${error.message}`

export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("ParsingError", renderParsingError),
    Match.tag("FormattingError", renderFormattingError),
    Match.tag("CliError", (cli) => `CLI_ERROR: ${cli.message}`),
    Match.tag("ConfigError", (config) => `CONFIG_ERROR: ${config.message}`),
    Match.exhaustive
  )
