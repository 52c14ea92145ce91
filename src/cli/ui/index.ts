export type { SummaryItem } from "./formatters";
export {
  exitCodeFor,
  formatArtifactTable,
  formatFailure,
  formatResumeFailure,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
} from "./formatters";
export { banner, color, LOGO, ui, VERSION } from "./output";
