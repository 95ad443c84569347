import type { Problem } from './types';

export function formatProblemPanel(problem: Problem): string {
  let msg = problem.message;
  if (problem.replacements.length > 0) {
    msg += '\n\nSuggestion(s): ' + problem.replacements.join(', ');
  }
  if (problem.urls.length > 0) {
    msg += '\n\nMore Info: ' + problem.urls.join('\n');
  }
  return msg;
}

export function formatProblemStatus(problem: Problem): string {
  if (problem.replacements.length > 0) {
    return `${problem.message} (${problem.replacements.join(', ')})`;
  }
  return problem.message;
}
