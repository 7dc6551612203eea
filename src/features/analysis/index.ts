/**
 * Persistent issue analysis
 */

export { analyze, type AnalyzeOptions } from './analyze.js';
export { serializeAnalysisResult } from './serialize.js';
export {
  formatAnalysisReport,
  formatPersistentIssue,
  formatRecommendations,
  formatWarning,
} from './report-formatter.js';
