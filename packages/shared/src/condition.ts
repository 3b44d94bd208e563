/**
 * @file packages/shared/src/condition.ts
 * @description Closed-form parser and evaluator for trigger conditions.
 *
 * Conditions are never executed as code. The grammar accepts exactly:
 *   value <op> <number>          op ∈ { <, >, <=, >=, == }
 *   change_percent > <number>
 */

export const COMPARISON_OPERATORS = ['<', '>', '<=', '>=', '=='] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export type Condition =
  | { kind: 'value'; operator: ComparisonOperator; threshold: number }
  | { kind: 'change_percent'; operator: '>'; threshold: number };

export type ConditionParseResult =
  | { ok: true; condition: Condition }
  | { ok: false; reason: string };

const CONDITION_PATTERN = /^\s*([a-z_]+)\s*(<=|>=|==|<|>)\s*(\S+)\s*$/;
const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a condition string into a tagged comparison.
 */
export function parseCondition(source: string): ConditionParseResult {
  const match = CONDITION_PATTERN.exec(source);
  if (!match) {
    return { ok: false, reason: `unrecognized condition "${source}"` };
  }
  const [, subject, operator, operand] = match;

  if (!NUMBER_PATTERN.test(operand)) {
    return { ok: false, reason: `threshold "${operand}" is not a number` };
  }
  const threshold = Number(operand);
  if (!Number.isFinite(threshold)) {
    return { ok: false, reason: `threshold "${operand}" is not finite` };
  }

  if (subject === 'value') {
    if (!isComparisonOperator(operator)) {
      return { ok: false, reason: `unsupported operator "${operator}"` };
    }
    return { ok: true, condition: { kind: 'value', operator, threshold } };
  }

  if (subject === 'change_percent') {
    if (operator !== '>') {
      return { ok: false, reason: 'change_percent only supports ">"' };
    }
    return { ok: true, condition: { kind: 'change_percent', operator: '>', threshold } };
  }

  return { ok: false, reason: `unknown subject "${subject}"` };
}

export function compare(left: number, operator: ComparisonOperator, right: number): boolean {
  switch (operator) {
    case '<':
      return left < right;
    case '>':
      return left > right;
    case '<=':
      return left <= right;
    case '>=':
      return left >= right;
    case '==':
      return left === right;
  }
}

/**
 * Evaluates a parsed condition. `previous` is the last sampled value, if any.
 * Anything that cannot be computed (no baseline, zero baseline, NaN) is "not met".
 */
export function evaluateCondition(
  condition: Condition,
  current: number,
  previous: number | null,
): boolean {
  if (condition.kind === 'value') {
    return compare(current, condition.operator, condition.threshold);
  }

  if (previous === null || previous === 0) return false;
  const change = Math.abs((current - previous) / previous) * 100;
  if (!Number.isFinite(change)) return false;
  return change > condition.threshold;
}

function isComparisonOperator(value: string): value is ComparisonOperator {
  return (COMPARISON_OPERATORS as readonly string[]).includes(value);
}
