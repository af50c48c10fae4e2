export interface AxisRange {
  min: number;
  max: number;
}

export interface PlotArea {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * Maps chart values (mass moment on x, mass on y) to pixel coordinates
 * inside the plot area. SVG y grows downwards, so mass is flipped.
 */
export class ChartProjection {
  constructor(
    readonly area: PlotArea,
    readonly x: AxisRange,
    readonly y: AxisRange
  ) {}

  toPixelX(value: number): number {
    const span = this.x.max - this.x.min;
    return this.area.left + ((value - this.x.min) / span) * (this.area.right - this.area.left);
  }

  toPixelY(value: number): number {
    const span = this.y.max - this.y.min;
    return this.area.bottom - ((value - this.y.min) / span) * (this.area.bottom - this.area.top);
  }
}

/** Range covering all values, padded by `padding` of the span on both sides */
export function paddedRange(values: number[], padding = 0.1): AxisRange {
  const lo = Math.min(...values);
  const hi = Math.max(...values);
  const span = hi - lo || Math.abs(hi) || 1;
  return { min: lo - span * padding, max: hi + span * padding };
}

/** Round `span / count` to the nearest 1, 2 or 5 times a power of ten, upwards */
export function niceStep(span: number, count: number): number {
  const raw = span / count;
  const magnitude = 10 ** Math.floor(Math.log10(raw));
  const fraction = raw / magnitude;
  const nice = fraction <= 1 ? 1 : fraction <= 2 ? 2 : fraction <= 5 ? 5 : 10;
  return nice * magnitude;
}

/** Multiples of a nice step that fall inside the range, about `count` of them */
export function ticks(range: AxisRange, count: number): number[] {
  const span = range.max - range.min;
  if (!(span > 0)) return [range.min];

  const step = niceStep(span, count);
  const out: number[] = [];
  for (let i = Math.ceil(range.min / step); i <= Math.floor(range.max / step); i++) {
    // `|| 0` turns -0 into 0
    out.push(i * step || 0);
  }
  return out;
}
