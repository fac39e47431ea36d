export { PerformanceMonitor } from './performance-monitor';
export type { DivergenceReport, ConfidenceLevel, MonitorReference } from './performance-monitor';
