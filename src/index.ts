/**
 * Library entry point
 */

export type {
  AppConfig,
  BorderStyle,
  DataRow,
  HeaderSource,
  OutputFormat,
  RenderOptions,
  SeparatorRow,
  Table,
  TableRow,
} from "./types/index.js";
export { buildConfig, cliOptionsSchema, type CliOptions } from "./config/options.js";
export { ColshapeError, ColumnSpecError, ConfigError, FilterPatternError, InputError } from "./errors.js";
export { readInput, toLines } from "./input/reader.js";
export { formatOutput, formatCsv, formatHtml, formatJson, formatYaml } from "./output/index.js";
export {
  processLines,
  splitLine,
  resolveHeader,
  filterLines,
  parseColumnSpecs,
  projectTable,
  sortRows,
  groupRows,
} from "./pipeline/index.js";
export { TableRenderer, DEFAULT_RENDER_OPTIONS } from "./display/table-renderer.js";
export { visibleWidth, stripAnsi } from "./utils/string-width.js";
export { parseNumber, isNumeric } from "./utils/numeric.js";
