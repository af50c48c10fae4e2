/**
 * Colors, fonts and layout of the weight and balance renderers.
 */

export const ChartColors = {
  background: '#ffffff',
  axis: '#000000',
  grid: '#d0d0d0',
  text: '#000000',
  envelope: '#ff0000',
  within: '#00ff00',
  outside: '#ff0000',
  landingPath: '#808080',
} as const;

export const ENVELOPE_OPACITY = 0.2;

export const ChartFonts = {
  family: 'sans-serif',
  caption: 40,
  label: 16,
  table: 14,
} as const;

/** Chart layout in pixels */
export const ChartLayout = {
  margin: 10,
  captionArea: 50,
  xLabelArea: 50,
  yLabelArea: 80,
  pointRadius: 5,
  ticks: 5,
} as const;

/** Table layout in pixels */
export const TableLayout = {
  margin: 10,
  rowHeight: 22,
  columnWidths: [200, 90, 110, 90, 130],
} as const;
