export type WellIndex = number;

export type TimeUnit = 'minutes' | 'hours' | 'days';

// Explicit numeric timepoints, or a unit name to convert the HH:MM:SS column into.
export type TimeSpec = string | readonly number[];

export interface SampleDefinition {
  readonly name: string;
  readonly wells: readonly WellIndex[];
}

export interface GroupDefinition {
  readonly name: string;
  readonly blankWells?: readonly WellIndex[];
  readonly samples: readonly SampleDefinition[];
}

export type Configuration = readonly GroupDefinition[];

export interface SampleDeclaration {
  name: string;
  wells: readonly WellIndex[];
}

export interface GroupDeclaration {
  name: string;
  blankWells?: readonly WellIndex[];
  samples: readonly SampleDeclaration[];
}

export interface RawTableMeta {
  runId: string;
  sourceFile: string;
  parserId: string;
  encoding: string | null;
  createdAt: string;
}

export interface RawTable {
  time: readonly string[]; // HH:MM:SS labels, row aligned
  wells: ReadonlyMap<WellIndex, readonly number[]>; // NaN = missing reading
  rowCount: number;
  meta?: RawTableMeta;
}

export interface SummaryColumn {
  readonly label: string; // <Group>__<Sample>
  readonly group: string;
  readonly sample: string;
  readonly values: readonly number[];
}

export interface SummaryTable {
  readonly time: readonly number[];
  readonly columns: readonly SummaryColumn[];
  readonly groups: readonly string[];
}

export interface TimePoint {
  x: number;
  y: number;
}

export interface SelectedSeries {
  label: string;
  group: string;
  points: TimePoint[];
}

export interface SeriesSelection {
  time: number[];
  series: SelectedSeries[];
  warnings: string[];
}
