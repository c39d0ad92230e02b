export {
  generate,
  generateDataset,
  assertCapacity,
  chooseSize,
  enumerateSubsets,
  type Transaction,
  type Dataset,
  type GenerateOptions,
  type GenerationStats,
  type GenerationResult,
} from './generator.js';
export {
  formatDataset,
  writeDataset,
  parseDataset,
  readDataset,
  summarizeDataset,
  generateToFile,
  type DatasetSummary,
  type GenerateToFileResult,
} from './dataset-file.js';
export { Xorshift128Plus, weightedIndex, sampleWithoutReplacement, type RandomSource } from './rng.js';
