import type { AirplaneSnapshot, LoadingCondition } from '@loadsheet/shared';
import { formatVolume } from '@loadsheet/shared';
import { ChartColors, ChartFonts, TableLayout } from './ChartTheme.js';
import { element, svgDocument, text } from './svg.js';

export const LOAD_TABLE_HEADER = ['Item', 'Arm [m]', 'Mass', 'Unit', 'Moment [kg m]'];

function conditionRows(label: string, condition: LoadingCondition): string[][] {
  return [
    [label, '', condition.massKg.toFixed(2), 'kg', condition.massMomentKgm.toFixed(2)],
    [`${label} CG`, condition.centerOfGravityM.toFixed(3), '', 'm', ''],
    [`${label} status`, '', '', '', condition.withinLimits ? 'Within limits' : 'OUTSIDE LIMITS'],
  ];
}

/** Load breakdown as table rows (header first), one per load item plus totals */
export function loadTableRows(snapshot: AirplaneSnapshot): string[][] {
  const rows = [LOAD_TABLE_HEADER];
  for (const m of snapshot.moments) {
    rows.push([
      m.name,
      m.leverArmM.toFixed(3),
      m.fuel ? formatVolume(m.fuel.volume) : m.massKg.toFixed(2),
      m.unitLabel,
      m.totalKgm.toFixed(2),
    ]);
  }
  rows.push(...conditionRows('Takeoff', snapshot.takeoff));
  if (snapshot.landing) {
    rows.push(...conditionRows('Landing', snapshot.landing));
  }
  return rows;
}

/** Render the load breakdown as an SVG table */
export function renderLoadTable(snapshot: AirplaneSnapshot): string {
  const rows = loadTableRows(snapshot);
  const { margin, rowHeight, columnWidths } = TableLayout;
  const width = margin * 2 + columnWidths.reduce((a, b) => a + b, 0);
  const height = margin * 2 + rowHeight * (rows.length + 1);

  const body: string[] = [
    element('rect', { width, height, fill: ChartColors.background }),
    text({ x: margin, y: margin + ChartFonts.table, 'font-weight': 'bold', 'font-size': ChartFonts.table }, snapshot.callsign),
  ];

  rows.forEach((row, r) => {
    const y = margin + rowHeight * (r + 1) + ChartFonts.table;
    let x = margin;
    row.forEach((cell, c) => {
      if (cell !== '') {
        body.push(
          text(
            {
              x,
              y,
              'font-family': ChartFonts.family,
              'font-size': ChartFonts.table,
              'font-weight': r === 0 ? 'bold' : undefined,
            },
            cell
          )
        );
      }
      x += columnWidths[c] ?? 0;
    });
    if (r === 0) {
      const lineY = y + 6;
      body.push(element('line', { x1: margin, y1: lineY, x2: width - margin, y2: lineY, stroke: ChartColors.axis }));
    }
  });

  return svgDocument(width, height, body);
}
