// Report exports
export { formatStats, formatSolutionPath } from './StatsReport';
