/**
 * Beat detection exports
 * @module signal/analysis
 */

export {
  determineThreshold,
  findIndicesAboveThreshold,
  findBeatSeparationPoints,
  findQrsPeakIndices,
  indexBeatTimes,
  detectBeats,
  determineVoltageExtremes,
  determineDuration,
  determineNumBeats,
  determineBpm,
  isPhysiologicallyPlausible,
  isVoltageInRange,
  analyzeRecording,
  type AnalyzeOptions,
} from './beat-detector';
