export {
  parseLabeledGraphs,
  createLabelMapping,
  toGspanFormat,
  toFsgFormat,
  formatNodeLabels,
  convertGraphDataset,
  type LabeledGraph,
  type LabeledEdge,
  type LabelMapping,
  type ConversionSummary,
} from './graph-converter.js';
