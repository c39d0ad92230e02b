/**
 * SVG runtime comparison chart: minimum support on x, runtime on y,
 * one line per algorithm.
 */

import { scaleLinear } from 'd3-scale';
import { line } from 'd3-shape';
import type { RuntimePivot } from '../results/table.js';

export interface PlotOptions {
  title?: string;
  width?: number;
  height?: number;
}

const MARGIN = { top: 50, right: 170, bottom: 60, left: 80 };
const PALETTE = ['#1f77b4', '#2ca02c', '#d62728', '#ff7f0e', '#9467bd', '#8c564b', '#e377c2', '#17becf'];
const Y_TICKS = 5;

interface PlotPoint {
  threshold: number;
  runtime: number | null;
}

function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function renderRuntimePlot(pivot: RuntimePivot, options: PlotOptions = {}): string {
  const width = options.width ?? 800;
  const height = options.height ?? 480;
  const title = options.title ?? 'Frequent Pattern Mining: Runtime Comparison';
  const plotWidth = width - MARGIN.left - MARGIN.right;
  const plotHeight = height - MARGIN.top - MARGIN.bottom;

  const { thresholds, series } = pivot;
  // A single threshold maps to the middle of the axis
  const x = scaleLinear()
    .domain(thresholds.length > 0 ? [thresholds[0], thresholds[thresholds.length - 1]] : [0, 100])
    .range([MARGIN.left, MARGIN.left + plotWidth]);

  const maxRuntime = Math.max(
    0,
    ...series.flatMap((s) => s.runtimes.filter((r): r is number => r !== null))
  );
  const y = scaleLinear()
    .domain([0, maxRuntime > 0 ? maxRuntime : 1])
    .nice(Y_TICKS)
    .range([MARGIN.top + plotHeight, MARGIN.top]);
  const formatTick = y.tickFormat(Y_TICKS);

  // Gaps (thresholds without a measurement) break the line
  const runtimeLine = line<PlotPoint>()
    .defined((d) => d.runtime !== null)
    .x((d) => x(d.threshold))
    .y((d) => y(d.runtime ?? 0))
    .digits(1);

  const lines: string[] = [];
  lines.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" ` +
      `viewBox="0 0 ${width} ${height}" font-family="sans-serif" font-size="12">`
  );
  lines.push(`  <rect width="${width}" height="${height}" fill="#ffffff"/>`);
  lines.push(
    `  <text x="${MARGIN.left + plotWidth / 2}" y="${MARGIN.top / 2}" text-anchor="middle" ` +
      `font-size="16">${escapeXml(title)}</text>`
  );

  // Grid and y ticks
  for (const value of y.ticks(Y_TICKS)) {
    const yPos = y(value).toFixed(1);
    lines.push(
      `  <line x1="${MARGIN.left}" y1="${yPos}" x2="${MARGIN.left + plotWidth}" y2="${yPos}" stroke="#e0e0e0"/>`
    );
    lines.push(
      `  <text x="${MARGIN.left - 8}" y="${yPos}" text-anchor="end" dominant-baseline="middle">` +
        `${formatTick(value)}</text>`
    );
  }

  // x ticks, one per threshold
  for (const t of thresholds) {
    const xPos = x(t).toFixed(1);
    lines.push(
      `  <line x1="${xPos}" y1="${MARGIN.top + plotHeight}" x2="${xPos}" y2="${MARGIN.top + plotHeight + 5}" stroke="#333333"/>`
    );
    lines.push(
      `  <text x="${xPos}" y="${MARGIN.top + plotHeight + 20}" text-anchor="middle">${t}</text>`
    );
  }

  // Axes
  lines.push(
    `  <line x1="${MARGIN.left}" y1="${MARGIN.top + plotHeight}" x2="${MARGIN.left + plotWidth}" ` +
      `y2="${MARGIN.top + plotHeight}" stroke="#333333"/>`
  );
  lines.push(
    `  <line x1="${MARGIN.left}" y1="${MARGIN.top}" x2="${MARGIN.left}" y2="${MARGIN.top + plotHeight}" stroke="#333333"/>`
  );
  lines.push(
    `  <text x="${MARGIN.left + plotWidth / 2}" y="${height - 15}" text-anchor="middle">Minimum Support (%)</text>`
  );
  lines.push(
    `  <text x="20" y="${MARGIN.top + plotHeight / 2}" text-anchor="middle" ` +
      `transform="rotate(-90 20 ${MARGIN.top + plotHeight / 2})">Runtime (seconds)</text>`
  );

  series.forEach((s, index) => {
    const color = PALETTE[index % PALETTE.length];
    lines.push(`  <g class="series" data-algorithm="${escapeXml(s.algorithm)}">`);

    const points: PlotPoint[] = thresholds.map((threshold, i) => ({ threshold, runtime: s.runtimes[i] ?? null }));
    const path = runtimeLine(points);
    // A lone measurement gets a marker but no line
    if (path && points.filter((p) => p.runtime !== null).length > 1) {
      lines.push(`    <path fill="none" stroke="${color}" stroke-width="2" d="${path}"/>`);
    }

    s.runtimes.forEach((runtime, i) => {
      if (runtime === null) return;
      // Hollow markers flag runs that found no frequent patterns
      const fill = s.statuses[i] === 'empty' ? '#ffffff' : color;
      lines.push(
        `    <circle cx="${x(thresholds[i]).toFixed(1)}" cy="${y(runtime).toFixed(1)}" r="4" ` +
          `fill="${fill}" stroke="${color}" stroke-width="2"/>`
      );
    });
    lines.push('  </g>');

    const legendY = MARGIN.top + 10 + index * 20;
    const legendX = MARGIN.left + plotWidth + 20;
    lines.push(
      `  <line x1="${legendX}" y1="${legendY}" x2="${legendX + 20}" y2="${legendY}" stroke="${color}" stroke-width="2"/>`
    );
    lines.push(
      `  <text x="${legendX + 28}" y="${legendY}" dominant-baseline="middle">${escapeXml(s.algorithm)}</text>`
    );
  });

  lines.push('</svg>');
  return `${lines.join('\n')}\n`;
}
