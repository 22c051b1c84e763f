export * from './types'
export { ConfigurationError, IOError, TimeFormatError, TimeLengthError } from './utils/errors'
export * from './modules/configuration_builder'
export * from './modules/summarizer'
export { getParser, getParsers, pickParserFor, type Parser, type ParseResult, type RawReadOptions } from './modules/input_files_converter'
export { rawTableFromColumns, readRawTable, type ReadRawTableOptions } from './modules/input_files_converter/readRawTable'
export * from './modules/plots_viewer'
export { runCli } from './cli'
