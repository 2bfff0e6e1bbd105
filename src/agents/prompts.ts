import type { DependencyHandoff, TaskSnapshot, TaskType } from '../types/index.js';

export const RESULT_FORMAT_SECTION = `## Reporting Back

When you stop, end your reply with ONE JSON object in a \`\`\`json block:

\`\`\`json
{
  "artifact": "path or short reference to what you produced (optional)",
  "blockers": ["anything that stops you from finishing (empty if none)"],
  "gates": { "<gate name>": true },
  "nextState": "<one of the allowed next states, or omit to stay put>",
  "note": "one line for the task history",
  "context": { "<key>": "facts the tasks after yours need, e.g. endpoints or decisions" }
}
\`\`\`

Only set a gate to true when you have evidence for it. Never claim \`complete\` while a
required gate is false; the tracker will refuse it and block the task.`;

export const ROLE_PROMPTS: Record<TaskType, string> = {
  architect: `# ARCHITECTURE TASK

You are the architect. Produce the design the rest of the team builds against:
components and their boundaries, data model, interfaces between parts, and the
risks you see. Write it down as a file in the repository and reference it as your
artifact. Do not implement features.`,

  coder: `# IMPLEMENTATION TASK

You are the coder. Implement the task against the existing architecture notes.

1. Read the relevant code before changing it
2. Write a failing test first, then the implementation
3. Run the test suite and look at the actual output

Set \`tests_passing\` only after you have seen the suite pass.`,

  reviewer: `# REVIEW TASK

You are the PR reviewer. Check the change for:

- Input validation, injection and auth mistakes
- Adherence to the architecture notes
- Error handling and duplicated code
- Missing tests and uncovered edge cases

Rank findings CRITICAL / HIGH / MEDIUM / LOW. Approve only when nothing CRITICAL or
HIGH remains; otherwise move the task to \`iteration\` and list the fixes in the note.`,

  qa: `# TESTING TASK

You are QA. Validate the implementation against its acceptance criteria: functional
behaviour, edge cases, error handling and regressions. Report each scenario as pass
or fail with steps to reproduce failures. Set \`qa_validated\` only when every
scenario passes.`,

  debug: `# DEBUGGING TASK

You are debugging a reported defect. Reproduce it first, find the root cause, then
fix it with a regression test that failed before the fix.`,

  docs: `# DOCUMENTATION TASK

You are the technical writer. Document the behaviour that exists now, with examples
that run. Keep it next to the code it describes.`,

  devops: `# DEVOPS TASK

You are the DevOps engineer. Make the build, test and deploy steps for this task run
unattended, and verify them by running them.`,

  security: `# SECURITY AUDIT TASK

You are the security auditor. Review the change for secrets in code, unsafe input
handling, dependency vulnerabilities and privilege problems. Set
\`security_approved\` only when nothing serious remains.`,
};

function formatHandoff(handoff: DependencyHandoff): string {
  const lines = [`### ${handoff.taskId}: ${handoff.title} (${handoff.type}, ${handoff.state})`];
  for (const item of handoff.deliverables) {
    lines.push(`- deliverable: ${item}`);
  }
  for (const [key, value] of Object.entries(handoff.context)) {
    lines.push(`- ${key}: ${value}`);
  }
  if (handoff.note) {
    lines.push(`- last note: ${handoff.note}`);
  }
  return lines.join('\n');
}

/**
 * Full prompt for one task: the role's instructions, then the task itself with what its
 * dependencies handed over, then the reporting format. Static text comes first so prompt
 * prefixes can be cached.
 */
export function buildTaskPrompt(
  task: TaskSnapshot,
  allowedStates: string[],
  handoffs: DependencyHandoff[] = []
): string {
  let prompt = ROLE_PROMPTS[task.type];

  prompt += `

## Current Task
ID: ${task.id}
Title: ${task.title}
Priority: ${task.priority}
State: ${task.state}`;

  if (task.description) {
    prompt += `\n\n${task.description}`;
  }

  const gates = Object.entries(task.qualityGates);
  if (gates.length > 0) {
    prompt += '\n\n## Quality Gates\n';
    for (const [gate, passed] of gates) {
      const required = task.requiredGates.includes(gate) ? ' (required)' : '';
      prompt += `- ${gate}: ${passed ? 'passed' : 'open'}${required}\n`;
    }
  }

  const context = Object.entries(task.context);
  if (context.length > 0) {
    prompt += '\n\n## Context\n';
    prompt += context.map(([key, value]) => `- ${key}: ${value}`).join('\n');
  }

  if (handoffs.length > 0) {
    prompt += '\n\n## Handoff From Dependencies\n';
    prompt += handoffs.map(formatHandoff).join('\n\n');
  }

  if (task.iterationCount > 0) {
    prompt += `\n\n## Iteration: ${task.iterationCount}/${task.maxIterations}`;
  }

  if (task.deliverables.length > 0) {
    prompt += '\n\n## Earlier Deliverables\n';
    prompt += task.deliverables.map((item) => `- ${item}`).join('\n');
  }

  const next = allowedStates.length > 0 ? allowedStates.join(', ') : 'none';
  prompt += `\n\n## Allowed Next States\n${next}`;
  prompt += `\n\n${RESULT_FORMAT_SECTION}`;
  return prompt;
}
