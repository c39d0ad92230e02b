/**
 * Convert command - labeled graph dataset to gSpan, Gaston and FSG inputs.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { convertGraphDataset } from '../../convert/index.js';
import { EXIT_CODES } from '../../constants.js';
import * as output from '../output.js';
import { reportError } from '../utils/error-hints.js';

export function createConvertCommand(): Command {
  return new Command('convert')
    .description('Convert a labeled graph dataset into gSpan, Gaston and FSG formats')
    .argument('<input>', 'Labeled graph file (#id, node count, labels, edge count, edges)')
    .argument('<output-dir>', 'Directory for gspan.txt, gaston.txt, fsg.txt and node_labels.txt')
    .option('--json', 'Print the conversion summary as JSON')
    .action((input: string, outputDir: string, options: { json?: boolean }) => {
      process.exitCode = handleConvert(input, outputDir, options);
    });
}

export const convertCommand = createConvertCommand();

export function handleConvert(input: string, outputDir: string, options: { json?: boolean } = {}): number {
  try {
    const summary = convertGraphDataset(input, outputDir);
    if (options.json) {
      output.json(summary);
      return EXIT_CODES.SUCCESS;
    }
    output.success(chalk.green(`✓ Converted ${summary.graphs} graphs`));
    output.keyValue('  Node labels', summary.nodeLabels);
    output.keyValue('  Edge labels', summary.edgeLabels);
    for (const file of Object.values(summary.files)) {
      output.listItem(file, 1);
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportError(error);
  }
}
