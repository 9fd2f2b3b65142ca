/**
 * Minimal structured SVG document: a tree of drawing commands plus a
 * deterministic serializer.
 *
 * Attributes keep insertion order and numbers go through one formatter, so
 * equal trees always serialize to equal bytes.
 */

export type SvgAttributeValue = string | number;

export type SvgTag = "svg" | "defs" | "desc" | "clipPath" | "g" | "circle" | "line" | "polyline";

export type SvgElement = {
  tag: SvgTag;
  attrs: ReadonlyArray<readonly [string, SvgAttributeValue]>;
  children: SvgElement[];
  text?: string;
};

export type SvgStyle = {
  fill?: string;
  stroke?: string;
  strokeWidth?: number;
  strokeDasharray?: readonly number[];
  opacity?: number;
  shapeRendering?: "geometricPrecision" | "crispEdges" | "auto";
};

const NUMBER_DECIMALS = 4;

export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new Error(`Cannot serialize non-finite SVG number: ${value}`);
  }
  const rounded = Number(value.toFixed(NUMBER_DECIMALS));
  return Object.is(rounded, -0) ? "0" : String(rounded);
}

function styleAttrs(style: SvgStyle): Array<readonly [string, SvgAttributeValue]> {
  const attrs: Array<readonly [string, SvgAttributeValue]> = [];
  if (style.fill !== undefined) attrs.push(["fill", style.fill]);
  if (style.stroke !== undefined) attrs.push(["stroke", style.stroke]);
  if (style.strokeWidth !== undefined) attrs.push(["stroke-width", style.strokeWidth]);
  if (style.strokeDasharray !== undefined) {
    attrs.push(["stroke-dasharray", style.strokeDasharray.map(formatNumber).join(",")]);
  }
  if (style.opacity !== undefined) attrs.push(["opacity", style.opacity]);
  if (style.shapeRendering !== undefined) attrs.push(["shape-rendering", style.shapeRendering]);
  return attrs;
}

export function circle(cx: number, cy: number, r: number, style: SvgStyle = {}): SvgElement {
  return {
    tag: "circle",
    attrs: [["cx", cx], ["cy", cy], ["r", r], ...styleAttrs(style)],
    children: [],
  };
}

export function line(
  start: { x: number; y: number },
  end: { x: number; y: number },
  style: SvgStyle = {}
): SvgElement {
  return {
    tag: "line",
    attrs: [["x1", start.x], ["y1", start.y], ["x2", end.x], ["y2", end.y], ...styleAttrs(style)],
    children: [],
  };
}

export function polyline(points: ReadonlyArray<{ x: number; y: number }>, style: SvgStyle = {}): SvgElement {
  const encoded = points.map((p) => `${formatNumber(p.x)},${formatNumber(p.y)}`).join(" ");
  return {
    tag: "polyline",
    attrs: [["points", encoded], ...styleAttrs(style)],
    children: [],
  };
}

export function group(
  attrs: ReadonlyArray<readonly [string, SvgAttributeValue]>,
  children: SvgElement[] = []
): SvgElement {
  return { tag: "g", attrs, children };
}

export function clipPath(id: string, children: SvgElement[]): SvgElement {
  return { tag: "clipPath", attrs: [["id", id]], children };
}

export function rotateTransform(angleDeg: number, cx: number, cy: number): string {
  return `rotate(${formatNumber(angleDeg)},${formatNumber(cx)},${formatNumber(cy)})`;
}

export type SvgDocument = {
  size: number;
  metadata?: string;
  defs: SvgElement[];
  body: SvgElement[];
};

export function createSvgDocument(size: number, metadata?: string): SvgDocument {
  return { size, metadata, defs: [], body: [] };
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function serializeValue(value: SvgAttributeValue): string {
  return typeof value === "number" ? formatNumber(value) : escapeXml(value);
}

function serializeElement(el: SvgElement): string {
  const attrs = el.attrs.map(([key, value]) => ` ${key}="${serializeValue(value)}"`).join("");
  if (el.text !== undefined) {
    return `<${el.tag}${attrs}>${escapeXml(el.text)}</${el.tag}>`;
  }
  if (!el.children.length) {
    return `<${el.tag}${attrs}/>`;
  }
  return `<${el.tag}${attrs}>${el.children.map(serializeElement).join("")}</${el.tag}>`;
}

export function serializeSvg(doc: SvgDocument): string {
  const size = formatNumber(doc.size);
  const children: SvgElement[] = [];
  if (doc.metadata !== undefined) {
    children.push({ tag: "desc", attrs: [], children: [], text: doc.metadata });
  }
  if (doc.defs.length) {
    children.push({ tag: "defs", attrs: [], children: doc.defs });
  }
  children.push(...doc.body);

  const root: SvgElement = {
    tag: "svg",
    attrs: [
      ["xmlns", "http://www.w3.org/2000/svg"],
      ["version", "1.1"],
      ["width", size],
      ["height", size],
      ["viewBox", `0 0 ${size} ${size}`],
    ],
    children,
  };

  return `<?xml version="1.0" encoding="utf-8" ?>\n${serializeElement(root)}\n`;
}
