/**
 * Collected data-quality issues of one integration run.
 *
 * @module core/issue-log
 */

import type { IntegrationIssue, IssueKind, IssueSource } from '../types/issues'
import type { Logger } from '../utils/logger'
import { createSilentLogger } from '../utils/logger'

/**
 * Records per-row issues and reports each one through the logger at `warn`.
 *
 * @example
 * ```typescript
 * const issues = new IssueLog(logger)
 * issues.record('malformed-date', 'athletes', 'Unparseable birth date', {
 *   rowNumber: 12,
 *   context: { raw: '31-Feb-1990' },
 * })
 * issues.count('malformed-date') // 1
 * ```
 */
export class IssueLog {
  private readonly entries: IntegrationIssue[] = []

  constructor(private readonly logger: Logger = createSilentLogger()) {}

  record(
    kind: IssueKind,
    source: IssueSource,
    message: string,
    details: { rowNumber?: number; context?: Record<string, unknown> } = {}
  ): IntegrationIssue {
    const issue: IntegrationIssue = { kind, source, message, ...details }
    this.entries.push(issue)
    this.logger.warn(message, {
      kind,
      source,
      ...(details.rowNumber !== undefined ? { rowNumber: details.rowNumber } : {}),
      ...details.context,
    })
    return issue
  }

  /**
   * Number of issues, optionally of one kind.
   */
  count(kind?: IssueKind): number {
    return kind ? this.entries.filter((issue) => issue.kind === kind).length : this.entries.length
  }

  /**
   * Issue counts per kind, only kinds that occurred.
   */
  summary(): Partial<Record<IssueKind, number>> {
    const counts: Partial<Record<IssueKind, number>> = {}
    for (const issue of this.entries) {
      counts[issue.kind] = (counts[issue.kind] ?? 0) + 1
    }
    return counts
  }

  toArray(): IntegrationIssue[] {
    return [...this.entries]
  }
}
