export interface AnalysisPromptInput {
  /** Relevant parts of the original file, see extractRelevantCode. */
  originalCode?: string;
  modifiedCode?: string;
  additionalContext?: string;
}

export const REQUIRED_FORMAT = `Provide technical explanation in this exact format:

## Solution
[Overall what changed]

### How It Works
[Technical details with code references]

### Impacts
[Potential effects on system]`;

/**
 * Task text for the code analyst. The section titles it asks for are the ones
 * the heading classifier renormalizes.
 */
export function buildAnalysisPrompt(input: AnalysisPromptInput): string {
  const sections = [
    "Analyze these code changes:",
    `Original Code (Key Sections):\n${input.originalCode || "No original code provided"}`,
    `Modified Code:\n${input.modifiedCode || "No changes detected"}`,
  ];

  if (input.additionalContext?.trim()) {
    sections.push(`Additional Context & Instructions:\n${input.additionalContext}`);
  }

  sections.push(REQUIRED_FORMAT);
  return sections.join("\n\n");
}
