export { runSweep, runPaths, type SweepOptions, type SweepProgress, type SweepResult } from './runner.js';
export {
  SpawnChildRunner,
  type ChildRunner,
  type ChildRunOptions,
  type ChildRunResult,
} from './child-runner.js';
export { classifyRun, matchesNoPatternSignature, type RunOutcome, type RunClassification } from './classify.js';
export {
  absoluteSupport,
  algorithmsFromExecutables,
  countDatasetRecords,
  deriveAlgorithmName,
  expandArgs,
  expandTemplate,
  normalizeThresholds,
  parseThresholdList,
  usesRecordCount,
  validateAlgorithms,
  type AlgoSpec,
  type TemplateValues,
} from './algorithm.js';
export { checkDataset, checkExecutable } from './preflight.js';
