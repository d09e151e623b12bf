export {
  runAnalysis,
  computeProjections,
  assembleArtifacts,
  type AnalyzeOptions,
  type AnalysisResult,
  type Projections,
} from './analyze.js';
