import type { RunReport } from '../contracts/run.js'

/**
 * Formats a run report as JSON output.
 *
 * @param report Run report.
 * @param indentation Number of spaces used for indentation.
 * @returns JSON representation.
 */
export const formatRunReportAsJson = (report: RunReport, indentation = 2): string => {
  return JSON.stringify(report, null, indentation)
}
