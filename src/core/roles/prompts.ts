import type { PromptSections } from './types.js';

export const EMPTY_SECTION = '- None';

/** `NAME:\n<body>\n\n` per section, in order. Blank bodies render as `- None`. */
export function renderSections(sections: PromptSections): string {
  return sections.map(([name, body]) => `${name}:\n${body.trim() || EMPTY_SECTION}\n\n`).join('');
}

export interface ProjectDocs {
  task: string;
  backlog: string;
  vision: string;
  architecture: string;
  conventions: string;
}

export function plannerSections(docs: ProjectDocs): PromptSections {
  return [
    ['TASK', docs.task],
    ['BACKLOG', docs.backlog],
    ['VISION', docs.vision],
    ['ARCHITECTURE', docs.architecture],
    ['CONVENTIONS', docs.conventions]
  ];
}

export function implementerSections(docs: ProjectDocs, plan: string, reviewFixes: string): PromptSections {
  return [
    ['TASK', docs.task],
    ['PLAN', plan],
    ['ARCHITECTURE', docs.architecture],
    ['CONVENTIONS', docs.conventions],
    ['REVIEW_FIXES', reviewFixes]
  ];
}

export interface ReviewerEvidence {
  toolOutputs: string;
  diff: string;
  redFlags: string;
  implementerReport: string;
}

export function reviewerSections(task: string, plan: string, evidence: ReviewerEvidence): PromptSections {
  return [
    ['TASK', task],
    ['PLAN', plan],
    ['TOOL_OUTPUTS', evidence.toolOutputs],
    ['DIFF', evidence.diff],
    ['RED_FLAGS', evidence.redFlags],
    ['IMPLEMENTER_REPORT', evidence.implementerReport]
  ];
}

export function techWriterSections(task: string, finalVerdict: string, fixes: string): PromptSections {
  const sections: PromptSections = [
    ['TASK', task],
    ['FINAL_VERDICT', finalVerdict]
  ];
  if (fixes.trim()) sections.push(['FIXES', fixes]);
  return sections;
}
