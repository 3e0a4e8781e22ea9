export { runScore, type ScoreOptions } from './score.js';
