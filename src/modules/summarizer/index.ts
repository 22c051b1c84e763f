export {
  LABEL_SEPARATOR,
  columnLabel,
  groupOfLabel,
  groupsOfColumns,
  meanOfWells,
  sampleOfLabel,
  summarize,
} from './summarize'
export { UNIT_LABELS, convertClockTimes, parseTimeUnit, resolveTimepoints } from './timepoints'
export { SUMMARY_TIME_COLUMN, formatSummary, loadSummary, parseSummary, writeSummaryFile } from './summaryFile'
export { selectSeries, type SeriesFilter } from './selectSeries'
