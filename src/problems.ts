import type { Problem, ServerMatch } from './types';

/**
 * Map a server match to a problem. The offset is relative to the submitted
 * text; `regionKey` and `originalContent` are filled in by the session.
 */
export function toProblem(match: ServerMatch): Problem {
  return {
    category: match.rule.category.name,
    message: match.message,
    replacements: match.replacements.map((r) => r.value),
    ruleId: match.rule.id,
    urls: (match.rule.urls ?? []).map((u) => u.value),
    offset: match.offset,
    length: match.length,
    regionKey: '',
    originalContent: '',
  };
}

/** Move a problem from excerpt coordinates to buffer coordinates. */
export function shiftOffset(problem: Problem, delta: number): Problem {
  return { ...problem, offset: problem.offset + delta };
}

export function isEqualProblem(a: Problem, b: Problem): boolean {
  return a.category === b.category && a.originalContent === b.originalContent;
}

/** Problems with the same category and original text as `x`, `x` included. */
export function getEqualProblems(problems: readonly Problem[], x: Problem): Problem[] {
  return problems.filter((p) => isEqualProblem(p, x));
}
