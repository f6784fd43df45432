/**
 * Prompt builders, one per role and phase.
 *
 * The agents keep no memory between calls, so every prompt carries the task
 * and all the code and feedback the agent needs inline.
 */

import type {
  CreatorInitialInputs,
  CritiqueInputs,
  ReviewInputs,
  RevisionInputs,
} from './context.js';

function fenced(code: string): string {
  return ['```', code, '```'].join('\n');
}

export function creatorInitialPrompt(inputs: CreatorInitialInputs): string {
  return `You are an expert software engineer. Implement a solution for the task below.

TASK: ${inputs.task}

REQUIREMENTS:
- Write complete, working code in the language the task asks for (pick a sensible one if it does not say).
- Handle edge cases and invalid input explicitly.
- Comment only the parts that are not obvious.
- Include a short usage example.

Reply with the code only, with no explanation before or after it.
`;
}

function reviewSections(startAt: number): string {
  const sections = [
    'BUGS & CORRECTNESS: logic errors, off-by-one errors, wrong assumptions, missing empty or null handling, places where the code does not solve the task.',
    'SECURITY: unvalidated input, injection, unsafe evaluation, leaked credentials.',
    'PERFORMANCE: current vs. optimal complexity, repeated work, missing early exits.',
    'CODE QUALITY: naming, dead or redundant code, departures from the idioms of the language.',
  ];
  return sections
    .map((section, offset) => `## ${startAt + offset}. ${section}`)
    .join('\n');
}

/**
 * Listing of the run's workspace, which is the reviewer's working directory
 */
function workspaceSection(files: readonly string[]): string {
  if (files.length === 0) {
    return '';
  }
  return `
WORKSPACE FILES (paths relative to your working directory; tests/ holds test command logs):
${files.map((file) => `- ${file}`).join('\n')}
`;
}

export function reviewPrompt(
  inputs: ReviewInputs,
  workspaceFiles: readonly string[] = []
): string {
  const files = workspaceSection(workspaceFiles);
  if (inputs.kind === 'originate') {
    return `You are a senior software engineer performing a code review.

TASK CONTEXT: the code below was written to solve: ${inputs.task}

CODE UNDER REVIEW:
${fenced(inputs.code)}
${files}
Write a structured review with these sections:
${reviewSections(1)}
## 5. OVERALL VERDICT: rate the code POOR / FAIR / GOOD / EXCELLENT and list the top 3 issues that must be fixed, separately from nice-to-have improvements.

Be objective. If the code is good, say so. Do not invent problems.
`;
  }

  const prior = inputs.cycle - 1;
  return `You are a senior software engineer performing an updated code review (cycle ${inputs.cycle}).

TASK CONTEXT: ${inputs.task}

The code was revised after the feedback of cycle ${prior}. A critic also evaluated your last review.

REVISED CODE:
${fenced(inputs.code)}
${files}
YOUR PREVIOUS REVIEW (cycle ${prior}):
${inputs.previousReview}

THE CRITIC'S EVALUATION OF THAT REVIEW (cycle ${prior}):
${inputs.priorCritique}

Write your updated review with these sections:
## 1. CHANGES SINCE LAST REVIEW: issues resolved, issues still present, new issues introduced by the revision.
${reviewSections(2)}
## 6. OVERALL VERDICT: acknowledge or rebut each point the critic called a false positive, rate the code POOR / FAIR / GOOD / EXCELLENT, and list the remaining must-fix issues.
`;
}

export function critiquePrompt(inputs: CritiqueInputs): string {
  const priorSection = inputs.ownPriorCritique
    ? `
YOUR PREVIOUS CRITIQUE (cycle ${inputs.cycle - 1}):
${inputs.ownPriorCritique}

Check whether the points you raised there were addressed in the current code.
`
    : '';

  return `You are a principal engineer giving a critical second opinion on a code review.

TASK CONTEXT: the code was written to solve: ${inputs.task}
${priorSection}
THE CODE THAT WAS REVIEWED:
${fenced(inputs.code)}

THE REVIEW YOU ARE EVALUATING (cycle ${inputs.cycle}):
${inputs.review}

Do not re-review the code. Evaluate the review itself:

## 1. MISSED ISSUES
Real problems in the code the reviewer did not mention. Analyse the code yourself.

## 2. FALSE POSITIVES
Review points that are wrong, overstated or irrelevant to this task, and why.

## 3. PRIORITY CALIBRATION
Whether the must-fix and nice-to-have lists and the verdict are fair.

## 4. BALANCE
Whether the review is too harsh, too lenient or about right.

## 5. ACTIONABLE RECOMMENDATIONS
At most 5 ranked items the author should actually work on, combining the valid review points with your own findings.
`;
}

export function revisionPrompt(inputs: RevisionInputs): string {
  return `You are an expert software engineer revising code based on structured feedback (cycle ${inputs.cycle}).

ORIGINAL TASK: ${inputs.task}

CURRENT CODE:
${fenced(inputs.code)}

REVIEW:
${inputs.review}

CRITIQUE OF THE REVIEW:
${inputs.critique}

Revise the code:
- Fix the real bugs and security issues the review found, unless the critique convincingly shows they are false positives.
- Apply the performance improvements that are practical.
- Prioritise the critique's actionable recommendations.
- Keep everything that already works.

Reply with the complete revised code only, with no explanation before or after it.
`;
}
