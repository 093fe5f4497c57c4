export { ProgressReporter, previewIssues, type ProgressReporterOptions } from './progress-reporter.js'
