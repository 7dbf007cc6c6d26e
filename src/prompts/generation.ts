/** Prompt templates for the Anthropic-backed generation oracle. */

import type { ArtifactSet, ReviewFinding } from '../models/build.js';
import type { Design, RequirementSet } from '../models/recipe.js';
import type { SeparationViolation } from '../utils/errors.js';
import type { CorrectedSources, FailureReport } from '../services/oracle.js';

const FILES_FORMAT = `\
## Output Format
Respond with ONLY a JSON object, no markdown fences or commentary:
{"files": {"<relative/path>": "<full file content>", ...}}
Paths are relative to the component root. Always return complete file contents, never diffs.`;

export const TEST_SYSTEM_PROMPT = `\
You are the test author for a test-first build pipeline. You write the test suite for a \
component BEFORE any implementation exists.

## Rules
- Cover the validation criteria of every MUST requirement, plus edge and error cases.
- Reference requirement ids in test names, e.g. \`it('req_3: rejects duplicate names', ...)\`.
- Tests import the implementation from the paths described by the design. The implementation \
does not exist yet, so the suite MUST fail when run on its own.
- Put tests in files ending in \`.test.ts\`.

${FILES_FORMAT}`;

export const IMPLEMENTATION_SYSTEM_PROMPT = `\
You are the implementer in a test-first build pipeline. A fixed test suite already exists; \
write the implementation that makes it pass.

## Rules
- The tests are the contract. Never create, edit or delete test files.
- Mark the code that satisfies each requirement with a comment naming its id, e.g. \`// req_3\`.
- No TODO/FIXME comments, placeholder bodies or "not implemented" errors.

${FILES_FORMAT}`;

export const REPAIR_SYSTEM_PROMPT = `\
You repair generated code so that a fixed test suite passes and no unfinished code remains.

## Rules
- Only change implementation files. Protected paths listed in the request are read-only.
- Address exactly the reported failures; keep requirement id comments intact.
- Return only the files you changed.

${FILES_FORMAT}`;

export const REVIEW_SYSTEM_PROMPT = `\
You are a code reviewer checking generated code against its requirements.

## Severity
- CRITICAL: a requirement is not met, behaviour is wrong, or the code is unsafe.
- SUGGESTION: style, naming, or optional improvements.

## Output Format
Respond with ONLY a JSON object:
{"summary": "<one paragraph>", "findings": [{"severity": "CRITICAL" | "SUGGESTION", "file": "<path>", "message": "<finding>"}]}`;

export const REVISE_SYSTEM_PROMPT = `\
You revise generated code to resolve critical review findings.

## Rules
- Resolve every listed finding. Do not touch test files.
- Return only the files you changed.

${FILES_FORMAT}`;

export const SEPARATION_SYSTEM_PROMPT = `\
You edit component specifications so that requirements say WHAT and designs say HOW.

## Rules
- Requirements keep their "- MUST|SHOULD|COULD" bullets and ids, with technology, algorithm \
and integration choices moved out into the design.
- The design keeps its sections but states no obligations: no MUST/SHALL/SHOULD/COULD tokens, \
no "the system shall", no "users can".

## Output Format
Respond with ONLY a JSON object: {"requirements": "<full markdown>", "design": "<full markdown>"}`;

function renderRequirementsBrief(requirements: RequirementSet): string {
  return requirements.requirements
    .map((r) => {
      const criteria = r.validationCriteria.map((c) => `    - ${c}`).join('\n');
      return `- [${r.id}] ${r.priority} ${r.description}${criteria ? `\n${criteria}` : ''}`;
    })
    .join('\n');
}

function renderDesignBrief(design: Design): string {
  const components = design.components
    .map((c) => `- ${c.name}: ${c.responsibility}${c.signatures.length ? `\n    ${c.signatures.join('\n    ')}` : ''}`)
    .join('\n');
  const interfaces = design.interfaces.map((i) => `- ${i.name}: ${i.description}`).join('\n');
  return [
    `Architecture: ${design.architectureSummary}`,
    components ? `Components:\n${components}` : '',
    interfaces ? `Interfaces:\n${interfaces}` : '',
  ].filter(Boolean).join('\n\n');
}

function renderFiles(artifacts: ArtifactSet): string {
  return Object.entries(artifacts.files)
    .map(([file, content]) => `### ${file}\n\`\`\`\n${content}\n\`\`\``)
    .join('\n\n');
}

export function testsUser(requirements: RequirementSet, designHints: Design): string {
  return `# Component: ${requirements.title}

## Purpose
${requirements.purpose}

## Requirements
${renderRequirementsBrief(requirements)}

## Design Hints
${renderDesignBrief(designHints)}`;
}

export function implementationUser(requirements: RequirementSet, design: Design, fixedTests: ArtifactSet): string {
  return `${testsUser(requirements, design)}

## Fixed Test Suite
${renderFiles(fixedTests)}`;
}

export function repairUser(artifacts: ArtifactSet, report: FailureReport): string {
  const failures = report.failures.map((f) => `- ${f.name}: ${f.details}`).join('\n');
  return `## Problem
${report.summary}

${failures ? `## Failing Tests\n${failures}\n\n` : ''}## Output
\`\`\`
${report.output.slice(0, 20_000)}
\`\`\`

## Protected Paths
${report.protectedPaths.map((p) => `- ${p}`).join('\n')}

## Current Files
${renderFiles(artifacts)}`;
}

export function reviewUser(artifacts: ArtifactSet, requirements: RequirementSet): string {
  return `## Requirements
${renderRequirementsBrief(requirements)}

## Files
${renderFiles(artifacts)}`;
}

export function reviseUser(artifacts: ArtifactSet, findings: ReviewFinding[]): string {
  return `## Critical Findings
${findings.map((f) => `- ${f.file ? `${f.file}: ` : ''}${f.message}`).join('\n')}

## Files
${renderFiles(artifacts)}`;
}

export function separationUser(sources: CorrectedSources, violations: SeparationViolation[]): string {
  return `## Violations
${violations.map((v) => `- ${v.artifact} line ${v.line}: "${v.text}" ${v.message}`).join('\n')}

## requirements.md
${sources.requirements}

## design.md
${sources.design}`;
}
