/**
 * Centralized Vitest setup for evidence-algebra
 *
 * Logs go to stderr and would interleave with test output; tests that
 * exercise the logger set EVIDENCE_LOG_LEVEL themselves.
 */

if (!process.env.EVIDENCE_LOG_LEVEL) {
  process.env.EVIDENCE_LOG_LEVEL = 'silent';
}
