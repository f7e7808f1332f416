// CHANGE: expose the codec as a library surface
// WHY: callers use the pure core directly or the Effect shell for file IO
// QUOTE(ECMA-404): n/a
// REF: req-public-api-1
// SOURCE: n/a
// FORMAT THEOREM: n/a
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: shell exports require FileSystem | Path services
// COMPLEXITY: O(1)

export type {
  AppError,
  ConfigError,
  FormattingError,
  FormattingErrorKind,
  InterfaceMisuse,
  InterfaceMisuseKind,
  ParsingError,
  ParsingErrorKind,
  SourceLocation
} from "./core/errors.js"
export {
  formattingError,
  interfaceMisuse,
  parsingError,
  renderFormattingError,
  renderInterfaceMisuse,
  renderParsingError
} from "./core/errors.js"
export type { NumberValue } from "./core/number.js"
export { convertNumber, isFloatLiteral } from "./core/number.js"
export type { Parsed } from "./core/parser.js"
export { parseText, parseTokens, parseValue } from "./core/parser.js"
export type {
  ConversionFailure,
  FloatRepresentation,
  IntegerRepresentation,
  PartialOrdering,
  Profile,
  ProfileName,
  StringRepresentation
} from "./core/representation.js"
export {
  float32,
  float64,
  int32,
  int64,
  makeProfile,
  narrow,
  narrowString,
  safe,
  safeInteger,
  standard,
  uint64,
  wideString
} from "./core/representation.js"
export { format } from "./core/serializer.js"
export { decodeString, encodeString } from "./core/string-codec.js"
export type { Token, TokenKind } from "./core/tokenizer.js"
export { tokenize } from "./core/tokenizer.js"
export type {
  JsonArray,
  JsonBool,
  JsonFloat,
  JsonInteger,
  JsonNull,
  JsonObject,
  JsonString,
  Plain,
  Value,
  ValueTag
} from "./core/value.js"
export {
  asArray,
  asBool,
  asFloat,
  asInteger,
  asObject,
  asString,
  at,
  compare,
  equals,
  get,
  isNull,
  jsonArray,
  jsonBool,
  jsonFloat,
  jsonInteger,
  jsonNull,
  jsonObject,
  jsonObjectFromRecord,
  jsonString,
  toPlain
} from "./core/value.js"
export { formatValue, parseFile, parseSource, writeToFile } from "./shell/codec.js"
