/**
 * Minimal SVG string building. All text and attribute values pass through escapeXml.
 */

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (c) => XML_ESCAPES[c] ?? c);
}

/** Format a coordinate: at most two decimals, no trailing zeros (e.g., 330, 12.5) */
export function fmt(n: number): string {
  return String(Number(n.toFixed(2)));
}

export type Attrs = Record<string, string | number | undefined>;

function renderAttrs(attrs: Attrs): string {
  return Object.entries(attrs)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([k, v]) => ` ${k}="${typeof v === 'number' ? fmt(v) : escapeXml(v)}"`)
    .join('');
}

/** Render an element; `children` is raw markup, use text() for content */
export function element(tag: string, attrs: Attrs, children?: string): string {
  if (children === undefined) return `<${tag}${renderAttrs(attrs)}/>`;
  return `<${tag}${renderAttrs(attrs)}>${children}</${tag}>`;
}

export function text(attrs: Attrs, content: string): string {
  return element('text', attrs, escapeXml(content));
}

export function svgDocument(width: number, height: number, body: string[]): string {
  return element(
    'svg',
    { xmlns: 'http://www.w3.org/2000/svg', width, height, viewBox: `0 0 ${width} ${height}` },
    body.join('')
  );
}
