// src/audit-core/error-categorizer.ts
// Rule-based classification of free-text log messages.

import type { ErrorCategory } from '@shared/types';

export interface CategoryRule {
  category: ErrorCategory;
  pattern: RegExp;
}

// ── Default rules ────────────────────────────────────────────────────────────
//
// Evaluated top to bottom, first match wins. Order is part of the contract:
//   1. timeout      "calculation exceeded timeout" is a timeout, not a calculation error
//   2. validation   "constraint violation" is a validation error even when raised by the database
//   3. database
//   4. calculation

export const DEFAULT_CATEGORY_RULES: readonly CategoryRule[] = [
  { category: 'timeout', pattern: /timeout|timed out|deadline exceeded/i },
  { category: 'validation', pattern: /validation|invalid|missing required|constraint/i },
  { category: 'database', pattern: /database|sql|connection|deadlock|transaction/i },
  { category: 'calculation', pattern: /calculation|compute|division by zero|\bnan\b|infinity/i },
];

const caseInsensitive = new WeakMap<RegExp, RegExp>();

/** Rules always match case-insensitively; a pattern without the `i` flag gets a copy with it. */
function ignoringCase(pattern: RegExp): RegExp {
  if (pattern.ignoreCase) return pattern;
  let copy = caseInsensitive.get(pattern);
  if (!copy) {
    copy = new RegExp(pattern.source, `${pattern.flags}i`);
    caseInsensitive.set(pattern, copy);
  }
  return copy;
}

/**
 * Classifies a message into one of the fixed error categories.
 * Messages matching no rule are `uncategorized`.
 */
export function categorizeError(
  message: string,
  rules: readonly CategoryRule[] = DEFAULT_CATEGORY_RULES,
): ErrorCategory {
  for (const rule of rules) {
    // `search` ignores the global flag and lastIndex, so caller-supplied /g rules stay stateless.
    if (message.search(ignoringCase(rule.pattern)) !== -1) {
      return rule.category;
    }
  }
  return 'uncategorized';
}

/** Returns a new rule list with `rule` at the lowest priority. */
export function appendRule(
  rules: readonly CategoryRule[],
  rule: CategoryRule,
): readonly CategoryRule[] {
  return [...rules, { category: rule.category, pattern: ignoringCase(rule.pattern) }];
}
