/**
 * Table capability and tab-separated codec.
 */

export { Table, type Row } from "./table.js";
export {
  formatCell,
  formatTsv,
  isGzipPath,
  parseTsv,
  readText,
  writeTsv,
  type Cell,
  type TsvColumn,
  type WriteTsvOptions,
} from "./tsv.js";
