export * from './scorers/index.js';
export { toReport, formatResultSummary, parseRecordsJson, type ScoreReport } from './report.js';
export { runScore, type ScoreOptions } from './commands/index.js';
