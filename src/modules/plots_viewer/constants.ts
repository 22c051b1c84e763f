export const CHART_WIDTH = 800;
export const CHART_HEIGHT = 800;
export const DEFAULT_X_LABEL = 'Time (h)';
export const DEFAULT_Y_LABEL = 'OD600';
export const DEFAULT_MARKER_SIZE = 3;
export const CHART_EXTENSION = '.svg';
