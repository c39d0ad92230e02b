/**
 * Labeled graph dataset conversion for subgraph miners.
 *
 * Input format, repeated per graph (blank lines ignored):
 *
 *   #<graph id>
 *   <node count>
 *   <node label>            (one line per node)
 *   <edge count>
 *   <source> <target> <edge label>   (one line per edge, 0-based node ids)
 *
 * Outputs: gSpan/Gaston ("t # i", "v id label", "e s t label") and FSG
 * (same, with "u" edges). Node labels are replaced by integers in sorted
 * label order.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { DatasetFormatError } from '../errors/types.js';
import { CONVERTER } from '../constants.js';
import { getLogger } from '../logging/logger.js';

export interface LabeledEdge {
  source: number;
  target: number;
  label: number;
}

export interface LabeledGraph {
  id: string;
  nodes: string[];
  edges: LabeledEdge[];
}

export interface LabelMapping {
  nodes: Map<string, number>;
  edges: Map<number, number>;
}

export interface ConversionSummary {
  graphs: number;
  nodeLabels: number;
  edgeLabels: number;
  files: {
    gspan: string;
    gaston: string;
    fsg: string;
    nodeLabels: string;
  };
}

interface Line {
  text: string;
  number: number;
}

function parseCount(line: Line | undefined, what: string, graphId: string): number {
  if (!line) {
    throw new DatasetFormatError(`Graph #${graphId}: expected ${what}, found end of file`);
  }
  if (!/^\d+$/.test(line.text)) {
    throw new DatasetFormatError(
      `Graph #${graphId}: expected ${what}, found ${JSON.stringify(line.text)}`,
      line.number
    );
  }
  return Number(line.text);
}

export function parseLabeledGraphs(text: string): LabeledGraph[] {
  const lines: Line[] = text
    .split(/\r?\n/)
    .map((raw, i) => ({ text: raw.trim(), number: i + 1 }))
    .filter((line) => line.text !== '');

  const graphs: LabeledGraph[] = [];
  let i = 0;
  while (i < lines.length) {
    const header = lines[i++];
    if (!header.text.startsWith('#')) {
      // Stray lines between graphs carry no structure
      continue;
    }
    const id = header.text.slice(1);

    const nodeCount = parseCount(lines[i++], 'node count', id);
    const nodes: string[] = [];
    for (let n = 0; n < nodeCount; n++) {
      const line = lines[i++];
      if (!line) {
        throw new DatasetFormatError(`Graph #${id}: expected ${nodeCount} node labels, found ${n}`);
      }
      nodes.push(line.text);
    }

    const edgeCount = parseCount(lines[i++], 'edge count', id);
    const edges: LabeledEdge[] = [];
    for (let e = 0; e < edgeCount; e++) {
      const line = lines[i++];
      if (!line) {
        throw new DatasetFormatError(`Graph #${id}: expected ${edgeCount} edges, found ${e}`);
      }
      const parts = line.text.split(/[\s,]+/);
      if (parts.length < 3 || !parts.slice(0, 3).every((p) => /^-?\d+$/.test(p))) {
        throw new DatasetFormatError(
          `Graph #${id}: edge must be "<source> <target> <label>", found ${JSON.stringify(line.text)}`,
          line.number
        );
      }
      const [source, target, label] = parts.slice(0, 3).map(Number);
      if (source < 0 || source >= nodeCount || target < 0 || target >= nodeCount) {
        throw new DatasetFormatError(
          `Graph #${id}: edge ${source}-${target} references a node outside 0..${nodeCount - 1}`,
          line.number
        );
      }
      edges.push({ source, target, label });
    }

    graphs.push({ id, nodes, edges });
  }
  return graphs;
}

export function createLabelMapping(graphs: readonly LabeledGraph[]): LabelMapping {
  const nodeLabels = new Set<string>();
  const edgeLabels = new Set<number>();
  for (const graph of graphs) {
    graph.nodes.forEach((label) => nodeLabels.add(label));
    graph.edges.forEach((edge) => edgeLabels.add(edge.label));
  }
  return {
    nodes: new Map([...nodeLabels].sort().map((label, index) => [label, index])),
    edges: new Map([...edgeLabels].sort((a, b) => a - b).map((label, index) => [label, index])),
  };
}

function formatGraphs(
  graphs: readonly LabeledGraph[],
  mapping: LabelMapping,
  edgeTag: 'e' | 'u'
): string {
  const lines: string[] = [];
  graphs.forEach((graph, index) => {
    lines.push(`t # ${index}`);
    graph.nodes.forEach((label, id) => {
      lines.push(`v ${id} ${mapping.nodes.get(label) ?? label}`);
    });
    for (const edge of graph.edges) {
      lines.push(`${edgeTag} ${edge.source} ${edge.target} ${edge.label}`);
    }
  });
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

/**
 * gSpan input format; Gaston reads the same.
 */
export function toGspanFormat(graphs: readonly LabeledGraph[], mapping: LabelMapping): string {
  return formatGraphs(graphs, mapping, 'e');
}

/**
 * FSG input format (undirected "u" edges).
 */
export function toFsgFormat(graphs: readonly LabeledGraph[], mapping: LabelMapping): string {
  return formatGraphs(graphs, mapping, 'u');
}

export function formatNodeLabels(mapping: LabelMapping): string {
  const rows = [...mapping.nodes.entries()]
    .sort((a, b) => a[1] - b[1])
    .map(([label, index]) => `${index}\t${label}`);
  return rows.length > 0 ? `${rows.join('\n')}\n` : '';
}

export function convertGraphDataset(inputPath: string, outputDir: string): ConversionSummary {
  const logger = getLogger('convert');
  const graphs = parseLabeledGraphs(readFileSync(inputPath, 'utf-8'));
  const mapping = createLabelMapping(graphs);
  logger.info(
    { graphs: graphs.length, nodeLabels: mapping.nodes.size, edgeLabels: mapping.edges.size },
    'Parsed labeled graphs'
  );

  mkdirSync(outputDir, { recursive: true });
  const files = {
    gspan: join(outputDir, CONVERTER.GSPAN_FILENAME),
    gaston: join(outputDir, CONVERTER.GASTON_FILENAME),
    fsg: join(outputDir, CONVERTER.FSG_FILENAME),
    nodeLabels: join(outputDir, CONVERTER.NODE_LABELS_FILENAME),
  };
  const gspan = toGspanFormat(graphs, mapping);
  writeFileSync(files.gspan, gspan, 'utf-8');
  writeFileSync(files.gaston, gspan, 'utf-8');
  writeFileSync(files.fsg, toFsgFormat(graphs, mapping), 'utf-8');
  writeFileSync(files.nodeLabels, formatNodeLabels(mapping), 'utf-8');

  return {
    graphs: graphs.length,
    nodeLabels: mapping.nodes.size,
    edgeLabels: mapping.edges.size,
    files,
  };
}
