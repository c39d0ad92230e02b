export { renderRuntimePlot, type PlotOptions } from './plot.js';
export { formatSummaryTable } from './summary.js';
