// Library entry point. The CLI lives in src/commands and is started by bin/run.js.
export { AdDetector } from './ad-detector.js';
export type { AdDetectorOptions, LaunchBrowser } from './ad-detector.js';
export { runAdPresenceMonitor, collectVideoIds } from './monitor.js';
export type { MonitorOptions, MonitorRunResult } from './monitor.js';
export { AdDetectionResult } from './common/AdDetectionResult.js';
export type { DetectionRecord } from './common/AdDetectionResult.js';
export { AppError } from './common/AppError.js';
export * from './common/types.js';
export { createEvidenceSet } from './common/evidence.js';
export { probeDom } from './utils/dom-probe.js';
export { classifyRequestUrl, recordRequest } from './utils/network-probe.js';
export { collectUiMarkers, parseUiMarkers, applyUiMarkers } from './utils/ui-probe.js';
export { determineVerdict, resolveSessionVerdict } from './utils/verdict.js';
export { runBatch } from './utils/batch-runner.js';
export type { VideoDetector, BatchOptions } from './utils/batch-runner.js';
export { extractVideoId } from './utils/video-id.js';
export { loadVideoIds } from './utils/video-loader.js';
export {
  writeDetectionResults,
  summarizeResults,
  resultsToCsv,
} from './utils/results-handler.js';
export type { DetectionSummary, ResultFilePaths } from './utils/results-handler.js';
export { DEFAULT_DETECTION_TIMINGS } from './config/app-config.js';
export type { DetectionTimings } from './config/app-config.js';
