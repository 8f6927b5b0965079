// ─── Channel Chart Renderer ──────────────────────────────────────────────────
//
// Pure SVG string generator. Draws the three channels' source values over
// output time so a run can be checked by eye.
//
// Layout (top → bottom):
//   1. Cloud coverage (%)           as read
//   2. Inverted cloud coverage (%)  what channel 1 plays
//   3. Solar sine                   what channel 2 plays
//   4. Sunrise ▲ / sunset ▼         what channel 3 plays
// X-axis = output seconds.
// ─────────────────────────────────────────────────────────────────────────────

import type { CleanedTable } from "./types.js";
import type { Timeline } from "./timeline/duration.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface ChartOptions {
  /** Default: 120 */
  bpm?: number;
  /** Solar sine amplitude, for the panel's y-range. Default: 6 */
  sineRange?: number;
  /** Plot width in pixels. Default: 1200 */
  width?: number;
  /** Height of each panel. Default: 140 */
  panelHeight?: number;
}

interface Panel {
  title: string;
  unit: string;
  min: number;
  max: number;
}

type Point = { x: number; y: number };

// ─── Theme Colors ───────────────────────────────────────────────────────────

const COLORS = {
  bg: "#1a1a2e",
  panelBg: "#151526",
  grid: "#2a2a3e",
  text: "#8888aa",
  headerText: "#ddddee",
  cloud: "#4a9eff",
  inverted: "#44dd88",
  solar: "#ffaa33",
  sunrise: "#ffd700",
  sunset: "#aa44ff",
};

// ─── Helpers ────────────────────────────────────────────────────────────────

/** XML-escape a string for SVG text content. */
function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function fmt(n: number): string {
  return n.toFixed(1);
}

/** Break a series at null values into drawable runs. */
function segments(points: Array<Point | null>): Point[][] {
  const runs: Point[][] = [];
  let current: Point[] = [];
  for (const p of points) {
    if (p === null) {
      if (current.length > 0) runs.push(current);
      current = [];
    } else {
      current.push(p);
    }
  }
  if (current.length > 0) runs.push(current);
  return runs;
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Render the table's channel values as an SVG document string.
 * No file I/O, no DOM.
 */
export function renderChannelChart(
  table: CleanedTable,
  timeline: Timeline,
  options?: ChartOptions,
): string {
  const opts = {
    bpm: options?.bpm ?? 120,
    sineRange: options?.sineRange ?? 6,
    width: options?.width ?? 1200,
    panelHeight: options?.panelHeight ?? 140,
  };

  const duration = Math.round(timeline.durationSeconds);
  const title = `3-Channel MIDI Data: ${opts.bpm} BPM, ${duration}s duration`;

  if (table.entries.length === 0) {
    return `<svg xmlns="http://www.w3.org/2000/svg" width="400" height="100">
      <rect width="400" height="100" fill="${COLORS.bg}"/>
      <text x="200" y="55" text-anchor="middle" fill="${COLORS.text}" font-family="monospace" font-size="14">No rows to chart</text>
    </svg>`;
  }

  const panels: Panel[] = [
    { title: "Channel 1: Cloud Coverage (Original)", unit: "%", min: 0, max: 100 },
    { title: "Channel 1: Inverted Cloud Coverage (Higher = Clearer Sky)", unit: "%", min: 0, max: 100 },
    { title: "Channel 2: Solar Sine Wave (Peaks Mid-Day)", unit: "", min: -opts.sineRange, max: opts.sineRange },
    { title: "Channel 3: Sunrise/Sunset Events", unit: "", min: -0.5, max: 1.5 },
  ];

  // ── Layout dimensions ──
  const labelWidth = 50;
  const headerHeight = 40;
  const panelGap = 30;
  const footerHeight = 30;
  const padding = 10;

  const gridX = labelWidth + padding;
  const totalWidth = gridX + opts.width + padding;
  const totalHeight = headerHeight + panels.length * (opts.panelHeight + panelGap) + footerHeight;

  const span = timeline.durationSeconds > 0 ? timeline.durationSeconds : 1;
  const xAt = (seconds: number): number => gridX + (seconds / span) * opts.width;
  const panelTop = (p: number): number => headerHeight + p * (opts.panelHeight + panelGap) + panelGap / 2;
  const yAt = (p: number, value: number): number => {
    const { min, max } = panels[p];
    const clamped = Math.max(min, Math.min(max, value));
    return panelTop(p) + opts.panelHeight - ((clamped - min) / (max - min)) * opts.panelHeight;
  };

  const lines: string[] = [];
  lines.push(`<svg xmlns="http://www.w3.org/2000/svg" width="${totalWidth}" height="${totalHeight}" viewBox="0 0 ${totalWidth} ${totalHeight}">`);
  lines.push(`<style>`);
  lines.push(`  text { font-family: 'Consolas', 'SF Mono', 'Fira Code', monospace; }`);
  lines.push(`  polyline { fill: none; stroke-width: 1; stroke-opacity: 0.8; }`);
  lines.push(`</style>`);
  lines.push(`<rect width="${totalWidth}" height="${totalHeight}" fill="${COLORS.bg}"/>`);
  lines.push(`<text x="${gridX}" y="${headerHeight - 14}" fill="${COLORS.headerText}" font-size="16" font-weight="bold">${esc(title)}</text>`);

  // ── Panel frames ──
  panels.forEach((panel, p) => {
    const top = panelTop(p);
    lines.push(`<rect x="${gridX}" y="${fmt(top)}" width="${opts.width}" height="${opts.panelHeight}" fill="${COLORS.panelBg}" stroke="${COLORS.grid}"/>`);
    lines.push(`<text x="${gridX}" y="${fmt(top - 4)}" fill="${COLORS.text}" font-size="11">${esc(panel.title)}</text>`);
    if (p < 3) {
      lines.push(`<text x="${gridX - 4}" y="${fmt(top + 10)}" text-anchor="end" fill="${COLORS.text}" font-size="9">${panel.max}${panel.unit}</text>`);
      lines.push(`<text x="${gridX - 4}" y="${fmt(top + opts.panelHeight)}" text-anchor="end" fill="${COLORS.text}" font-size="9">${panel.min}${panel.unit}</text>`);
    }
  });

  // ── Series ──
  const entries = table.entries;
  const xs = entries.map((_, i) => xAt(timeline.startTime(i)));

  const series: Array<{ panel: number; color: string; points: Array<Point | null> }> = [
    {
      panel: 0,
      color: COLORS.cloud,
      points: entries.map((e, i) => (e.row.cloudCoverage === null ? null : { x: xs[i], y: yAt(0, e.row.cloudCoverage) })),
    },
    {
      panel: 1,
      color: COLORS.inverted,
      points: entries.map((e, i) => ({ x: xs[i], y: yAt(1, 100 - Math.max(0, Math.min(100, e.row.cloudCoverage ?? 0))) })),
    },
    {
      panel: 2,
      color: COLORS.solar,
      points: entries.map((e, i) => ({ x: xs[i], y: yAt(2, e.solar.sine) })),
    },
  ];

  for (const s of series) {
    for (const run of segments(s.points)) {
      const pts = run.map(p => `${fmt(p.x)},${fmt(p.y)}`).join(" ");
      lines.push(`<polyline class="panel-${s.panel + 1}" points="${pts}" stroke="${s.color}"/>`);
    }
  }

  // ── Event markers ──
  entries.forEach((e, i) => {
    if (e.solar.isSunriseEvent) {
      const x = xs[i];
      const y = yAt(3, 1);
      lines.push(`<path class="sunrise" d="M${fmt(x)},${fmt(y - 5)} L${fmt(x - 5)},${fmt(y + 4)} L${fmt(x + 5)},${fmt(y + 4)} Z" fill="${COLORS.sunrise}"/>`);
    }
    if (e.solar.isSunsetEvent) {
      const x = xs[i];
      const y = yAt(3, 0);
      lines.push(`<path class="sunset" d="M${fmt(x)},${fmt(y + 5)} L${fmt(x - 5)},${fmt(y - 4)} L${fmt(x + 5)},${fmt(y - 4)} Z" fill="${COLORS.sunset}"/>`);
    }
  });

  const eventTop = panelTop(3);
  lines.push(`<text x="${gridX - 4}" y="${fmt(yAt(3, 1) + 3)}" text-anchor="end" fill="${COLORS.sunrise}" font-size="9">Sunrise</text>`);
  lines.push(`<text x="${gridX - 4}" y="${fmt(yAt(3, 0) + 3)}" text-anchor="end" fill="${COLORS.sunset}" font-size="9">Sunset</text>`);

  // ── Time axis ──
  const axisY = eventTop + opts.panelHeight + 16;
  const ticks = 10;
  for (let t = 0; t <= ticks; t++) {
    const seconds = (timeline.durationSeconds * t) / ticks;
    lines.push(`<text x="${fmt(xAt(seconds))}" y="${fmt(axisY)}" text-anchor="middle" fill="${COLORS.text}" font-size="9">${Math.round(seconds)}s</text>`);
  }

  lines.push(`</svg>`);
  return lines.join("\n");
}
