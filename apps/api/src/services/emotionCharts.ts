import { EMOTION_COLORS, EMOTION_KEYS, FALLBACK_BAR_COLOR, type EmotionKey, type EmotionRecord } from "./reportSchema.js";

export type ChartBar = { key: EmotionKey; label: string; value: number; color: string };

export type ChartLayout = {
  width: number;
  height: number;
  padding: number;
  barSpacing: number;
  barWidth: number;
};

export type AbsoluteChartSpec = ChartLayout & { kind: "absolute"; bars: ChartBar[]; effectiveMax: number; plotHeight: number };

export type DifferentialChartSpec = ChartLayout & {
  kind: "differential";
  bars: ChartBar[];
  maxAbs: number;
  panel: number;
  baseline: number;
};

export type ChartOptions = {
  title: string;
  labels: Record<EmotionKey, string>;
  emptyMessage: string;
};

export const CHART_WIDTH = 600;
export const CHART_PADDING = 40;
export const BAR_SPACING = 15;
export const MIN_BAR_WIDTH = 20;
// Height a 100% bar would take.
export const FULL_SCALE_HEIGHT = 250;
export const MIN_SCALE = 5;

const FONT = "IBMPlexSans";
const LABEL_OFFSET = 5;

export function buildAbsoluteChartSpec(record: EmotionRecord, labels: Record<EmotionKey, string>): AbsoluteChartSpec | null {
  const bars = presentBars(record, labels);
  if (bars.length === 0 || bars.every((b) => b.value === 0)) return null;

  const effectiveMax = Math.max(MIN_SCALE, ...bars.map((b) => b.value));
  const height = Math.floor((effectiveMax / 100) * FULL_SCALE_HEIGHT) + 2 * CHART_PADDING;

  return {
    kind: "absolute",
    bars,
    effectiveMax,
    width: CHART_WIDTH,
    height,
    padding: CHART_PADDING,
    plotHeight: height - 2 * CHART_PADDING,
    barSpacing: BAR_SPACING,
    barWidth: barWidthFor(bars.length)
  };
}

export function buildDifferentialChartSpec(
  record: EmotionRecord,
  averages: EmotionRecord,
  labels: Record<EmotionKey, string>
): DifferentialChartSpec | null {
  const bars: ChartBar[] = [];
  for (const key of EMOTION_KEYS) {
    const value = record[key];
    const average = averages[key];
    if (value === undefined && average === undefined) continue;
    bars.push({ key, label: labels[key], value: round2((value ?? 0) - (average ?? 0)), color: colorFor(key) });
  }
  if (bars.length === 0) return null;

  const maxAbs = Math.max(MIN_SCALE, ...bars.map((b) => Math.abs(b.value)));
  const panel = (maxAbs / 100) * FULL_SCALE_HEIGHT;

  return {
    kind: "differential",
    bars,
    maxAbs,
    panel,
    baseline: CHART_PADDING + panel,
    width: CHART_WIDTH,
    height: Math.floor(panel * 2 + CHART_PADDING * 2),
    padding: CHART_PADDING,
    barSpacing: BAR_SPACING,
    barWidth: barWidthFor(bars.length)
  };
}

export function renderAbsoluteChart(record: EmotionRecord, options: ChartOptions): string {
  const spec = buildAbsoluteChartSpec(record, options.labels);
  if (!spec) return emptyChart(options.emptyMessage);

  const { width, height, padding, plotHeight, effectiveMax } = spec;
  const axisY = height - padding;
  const parts: string[] = [titleElement(options.title, width)];

  parts.push(lineElement(padding, axisY, width - padding, axisY, "#ccc", 1));

  for (let i = 0; i <= 4; i++) {
    const share = i / 4;
    const y = axisY - share * plotHeight;
    parts.push(axisLabel(padding - 10, y + 5, `${fmt(effectiveMax * share)}%`));
    parts.push(lineElement(padding, y, width - padding, y, "#eee", 0.5));
  }

  spec.bars.forEach((bar, i) => {
    const x = barX(spec, i);
    const barHeight = (bar.value / effectiveMax) * plotHeight;
    const y = axisY - barHeight;
    parts.push(rectElement(x, y, spec.barWidth, barHeight, bar.color));

    let labelY = y - LABEL_OFFSET;
    if (labelY < 15) labelY = y + 15;
    parts.push(valueLabel(x + spec.barWidth / 2, labelY, `${bar.value.toFixed(1)}%`));
    parts.push(categoryLabel(x + spec.barWidth / 2, axisY + 20, bar.label));
  });

  return wrapChart(spec, parts);
}

export function renderDifferentialChart(record: EmotionRecord, averages: EmotionRecord, options: ChartOptions): string {
  const spec = buildDifferentialChartSpec(record, averages, options.labels);
  if (!spec) return emptyChart(options.emptyMessage);

  const { width, padding, panel, baseline, maxAbs } = spec;
  const parts: string[] = [titleElement(options.title, width)];

  parts.push(lineElement(padding, baseline, width - padding, baseline, "#ccc", 1));

  for (const mark of [-maxAbs, 0, maxAbs]) {
    const y = baseline - (mark / maxAbs) * panel;
    parts.push(axisLabel(padding - 10, y + 4, `${mark.toFixed(0)}%`));
    parts.push(lineElement(padding, y, padding + 5, y, "#ccc", 0.5));
  }

  spec.bars.forEach((bar, i) => {
    const x = barX(spec, i);
    const barHeight = (Math.abs(bar.value) / maxAbs) * panel;
    const positive = bar.value >= 0;
    const y = positive ? baseline - barHeight : baseline;
    parts.push(rectElement(x, y, spec.barWidth, barHeight, bar.color));

    const labelY = positive ? y - LABEL_OFFSET : y + barHeight + 15;
    parts.push(valueLabel(x + spec.barWidth / 2, labelY, signedPercent(bar.value)));
    parts.push(categoryLabel(x + spec.barWidth / 2, baseline + panel + 20, bar.label));
  });

  return wrapChart(spec, parts);
}

export function colorFor(key: string): string {
  return isEmotionKey(key) ? EMOTION_COLORS[key] : FALLBACK_BAR_COLOR;
}

function isEmotionKey(key: string): key is EmotionKey {
  return EMOTION_KEYS.some((k) => k === key);
}

function presentBars(record: EmotionRecord, labels: Record<EmotionKey, string>): ChartBar[] {
  const bars: ChartBar[] = [];
  for (const key of EMOTION_KEYS) {
    const value = record[key];
    if (value === undefined || !Number.isFinite(value)) continue;
    bars.push({ key, label: labels[key], value, color: colorFor(key) });
  }
  return bars;
}

export function barWidthFor(count: number): number {
  const width = (CHART_WIDTH - 2 * CHART_PADDING - (count - 1) * BAR_SPACING) / count;
  return width > 0 ? width : MIN_BAR_WIDTH;
}

function barX(layout: ChartLayout, index: number): number {
  return layout.padding + index * (layout.barWidth + layout.barSpacing);
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function signedPercent(value: number): string {
  return value >= 0 ? `+${value.toFixed(1)}%` : `${value.toFixed(1)}%`;
}

/** Fixed-precision coordinate text; never locale dependent. */
export function fmt(n: number): string {
  const rounded = Math.round(n * 100) / 100;
  return String(Object.is(rounded, -0) ? 0 : rounded);
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function emptyChart(message: string): string {
  return `<p class="chart-empty">${escapeXml(message)}</p>`;
}

function titleElement(title: string, width: number): string {
  return (
    `<text x="${fmt(width / 2)}" y="25" font-family="${FONT}" font-size="12" text-anchor="middle" fill="#333" font-weight="400">` +
    `${escapeXml(title)}</text>`
  );
}

function lineElement(x1: number, y1: number, x2: number, y2: number, stroke: string, strokeWidth: number): string {
  return `<line x1="${fmt(x1)}" y1="${fmt(y1)}" x2="${fmt(x2)}" y2="${fmt(y2)}" stroke="${stroke}" stroke-width="${strokeWidth}"/>`;
}

function rectElement(x: number, y: number, width: number, height: number, fill: string): string {
  return `<rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(width)}" height="${fmt(height)}" fill="${fill}" rx="3" ry="3"/>`;
}

function axisLabel(x: number, y: number, text: string): string {
  return `<text x="${fmt(x)}" y="${fmt(y)}" font-family="${FONT}" font-size="10" text-anchor="end" fill="#555">${escapeXml(text)}</text>`;
}

function valueLabel(x: number, y: number, text: string): string {
  return (
    `<text x="${fmt(x)}" y="${fmt(y)}" font-family="${FONT}" font-size="12" text-anchor="middle" fill="#333" font-weight="bold">` +
    `${escapeXml(text)}</text>`
  );
}

function categoryLabel(x: number, y: number, text: string): string {
  return `<text x="${fmt(x)}" y="${fmt(y)}" font-family="${FONT}" font-size="11" text-anchor="middle" fill="#555">${escapeXml(text)}</text>`;
}

function wrapChart(layout: ChartLayout & { kind: string }, parts: string[]): string {
  const { width, height } = layout;
  return (
    `<div class="emotion-chart emotion-chart--${layout.kind}" style="text-align:center;margin:20px auto;opacity:0.6;">` +
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" ` +
    `style="background-color:#fcfcfc;border:1px solid #eee;border-radius:8px;">` +
    parts.join("") +
    "</svg></div>"
  );
}
