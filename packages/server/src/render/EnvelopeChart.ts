import type { AirplaneSnapshot, LoadingCondition } from '@loadsheet/shared';
import { ChartColors, ChartFonts, ChartLayout, ENVELOPE_OPACITY } from './ChartTheme.js';
import type { AxisRange } from './ChartProjection.js';
import { ChartProjection, paddedRange, ticks } from './ChartProjection.js';
import { element, fmt, svgDocument, text } from './svg.js';

export interface EnvelopeChartOptions {
  width?: number;
  height?: number;
  /** Mass moment range (kg m); defaults to the envelope and points, padded 10% */
  xAxis?: AxisRange;
  /** Mass range (kg); defaults to the envelope and points, padded 10% */
  yAxis?: AxisRange;
}

const DEFAULT_WIDTH = 800;
const DEFAULT_HEIGHT = 600;

/**
 * Envelope corners in (mass moment, mass) space: the CG limits are lines
 * through the origin, cut off at minimum weight and MTOW.
 */
export function envelopePolygon(snapshot: AirplaneSnapshot): Array<[number, number]> {
  const { minimumWeightKg, mtowKg, forwardCgLimitM, rearwardCgLimitM } = snapshot.limits;
  return [
    [forwardCgLimitM * minimumWeightKg, minimumWeightKg],
    [rearwardCgLimitM * minimumWeightKg, minimumWeightKg],
    [rearwardCgLimitM * mtowKg, mtowKg],
    [forwardCgLimitM * mtowKg, mtowKg],
  ];
}

function conditions(snapshot: AirplaneSnapshot): LoadingCondition[] {
  return snapshot.landing ? [snapshot.takeoff, snapshot.landing] : [snapshot.takeoff];
}

function pointColor(condition: LoadingCondition): string {
  return condition.withinLimits ? ChartColors.within : ChartColors.outside;
}

function formatTick(value: number, range: AxisRange): string {
  return range.max - range.min >= 10 ? value.toFixed(0) : value.toFixed(2);
}

function axes(projection: ChartProjection): string[] {
  const { area, x, y } = projection;
  const out: string[] = [
    element('line', { x1: area.left, y1: area.bottom, x2: area.right, y2: area.bottom, stroke: ChartColors.axis }),
    element('line', { x1: area.left, y1: area.top, x2: area.left, y2: area.bottom, stroke: ChartColors.axis }),
  ];

  for (const value of ticks(x, ChartLayout.ticks)) {
    const px = projection.toPixelX(value);
    out.push(element('line', { x1: px, y1: area.top, x2: px, y2: area.bottom, stroke: ChartColors.grid }));
    out.push(
      text(
        { x: px, y: area.bottom + ChartFonts.label + 4, 'text-anchor': 'middle', 'font-size': ChartFonts.label },
        formatTick(value, x)
      )
    );
  }
  for (const value of ticks(y, ChartLayout.ticks)) {
    const py = projection.toPixelY(value);
    out.push(element('line', { x1: area.left, y1: py, x2: area.right, y2: py, stroke: ChartColors.grid }));
    out.push(
      text(
        { x: area.left - 6, y: py + ChartFonts.label / 3, 'text-anchor': 'end', 'font-size': ChartFonts.label },
        formatTick(value, y)
      )
    );
  }

  const midX = (area.left + area.right) / 2;
  const midY = (area.top + area.bottom) / 2;
  out.push(
    text(
      { x: midX, y: area.bottom + ChartLayout.xLabelArea - 4, 'text-anchor': 'middle', 'font-size': ChartFonts.label },
      'Mass Moment [kg m]'
    ),
    text(
      {
        x: ChartLayout.margin + ChartFonts.label,
        y: midY,
        'text-anchor': 'middle',
        'font-size': ChartFonts.label,
        transform: `rotate(-90 ${fmt(ChartLayout.margin + ChartFonts.label)} ${fmt(midY)})`,
      },
      'Mass [kg]'
    )
  );
  return out;
}

/**
 * Render the weight and balance envelope with the takeoff point (filled)
 * and, when fuel is tracked, the landing point (hollow) as an SVG document.
 */
export function renderEnvelopeChart(snapshot: AirplaneSnapshot, options: EnvelopeChartOptions = {}): string {
  const width = options.width ?? DEFAULT_WIDTH;
  const height = options.height ?? DEFAULT_HEIGHT;
  const polygon = envelopePolygon(snapshot);
  const points = conditions(snapshot);

  const xAxis =
    options.xAxis ?? paddedRange([...polygon.map(([m]) => m), ...points.map((c) => c.massMomentKgm)]);
  const yAxis = options.yAxis ?? paddedRange([...polygon.map(([, kg]) => kg), ...points.map((c) => c.massKg)]);

  const projection = new ChartProjection(
    {
      left: ChartLayout.margin + ChartLayout.yLabelArea,
      top: ChartLayout.margin + ChartLayout.captionArea,
      right: width - ChartLayout.margin,
      bottom: height - ChartLayout.margin - ChartLayout.xLabelArea,
    },
    xAxis,
    yAxis
  );

  const body: string[] = [
    element('rect', { width, height, fill: ChartColors.background }),
    text(
      {
        x: width / 2,
        y: ChartLayout.margin + ChartFonts.caption,
        'text-anchor': 'middle',
        'font-family': ChartFonts.family,
        'font-size': ChartFonts.caption,
      },
      snapshot.callsign
    ),
    ...axes(projection),
    element('polygon', {
      'data-role': 'envelope',
      points: polygon.map(([m, kg]) => `${fmt(projection.toPixelX(m))},${fmt(projection.toPixelY(kg))}`).join(' '),
      fill: ChartColors.envelope,
      'fill-opacity': ENVELOPE_OPACITY,
    }),
  ];

  const { takeoff, landing } = snapshot;
  const takeoffX = projection.toPixelX(takeoff.massMomentKgm);
  const takeoffY = projection.toPixelY(takeoff.massKg);

  if (landing) {
    const landingX = projection.toPixelX(landing.massMomentKgm);
    const landingY = projection.toPixelY(landing.massKg);
    body.push(
      element('line', {
        'data-role': 'fuel-burn',
        x1: takeoffX,
        y1: takeoffY,
        x2: landingX,
        y2: landingY,
        stroke: ChartColors.landingPath,
        'stroke-dasharray': '4 4',
      }),
      element('circle', {
        'data-role': 'landing',
        cx: landingX,
        cy: landingY,
        r: ChartLayout.pointRadius,
        fill: 'none',
        stroke: pointColor(landing),
        'stroke-width': 2,
      })
    );
  }

  body.push(
    element('circle', {
      'data-role': 'takeoff',
      cx: takeoffX,
      cy: takeoffY,
      r: ChartLayout.pointRadius,
      fill: pointColor(takeoff),
    })
  );

  return svgDocument(width, height, body);
}
