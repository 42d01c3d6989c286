/**
 * result-aggregator module: pipeline verdict and report.
 */

export { aggregate, formatReport } from './result-aggregator.js'
export type { FormatReportOptions } from './result-aggregator.js'
