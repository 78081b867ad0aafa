import { ENTRY_POINT } from '../sandbox/contextScripts';

export const HYPOTHESIS_PROMPT =
  'You are an expert data analyst. Generate hypotheses that would be valuable to test on this dataset. ' +
  'Each hypothesis should be clear, specific, and testable.';

export const ANALYSIS_PROMPT = `You are an expert data scientist. Given a hypothesis and dataset description, write JavaScript code to test this hypothesis using appropriate statistical methods.

CRITICAL: Your code must follow this exact pattern:

\`\`\`javascript
function ${ENTRY_POINT}(df) {
  // df.columns       -> column names
  // df.dtypes        -> { name: 'numeric' | 'textual' | 'temporal' | 'mixed' }
  // df.rows          -> array of row objects
  // df.column(name)  -> array of the column's values (null for missing)
  // df.unique(name), df.filter(row => ...), df.groupBy(name) -> Map of value to frame
  //
  // stats is the simple-statistics library, e.g.
  //   stats.tTestTwoSample, stats.sampleCorrelation, stats.permutationTest, stats.chiSquaredGoodnessOfFit
  //
  // Return [isSignificant, pValue] where isSignificant is a boolean
  // and pValue is a number between 0 and 1.
  //
  // Example:
  //   const pValue = stats.permutationTest(groupA, groupB, 'two_side', 1000);
  //   return [pValue < 0.05, pValue];
}
\`\`\`

Use the most appropriate statistical test based on the hypothesis and data types. Do not use require, import or asynchronous code. Always return exactly [boolean, number].`;

export const SUMMARY_PROMPT = `You are an expert data analyst.
Given a hypothesis and its outcome, provide a plain English summary of the findings as a crisp H5 heading (#####), followed by 1-2 concise supporting sentences.
Highlight in **bold** the keywords in the supporting statements.
Do not mention the p-value but _interpret_ it to support the conclusion quantitatively.`;

export const SYNTHESIS_PROMPT = `Given the below hypotheses and results, summarize the key takeaways and actions in Markdown.
Begin with the hypotheses with lowest p-values AND highest business impact. Ignore results with errors.
Use action titles has H5 (#####). Just reading titles should tell the audience EXACTLY what to do.
Below each, add supporting bullet points that
  - PROVE the action title, mentioning which hypotheses led to this conclusion.
  - Do not mention the p-value but _interpret_ it to support the action
  - Highlight key phrases in **bold**.
Finally, after a break (---) add a 1-paragraph executive summary section (H5) summarizing these actions.`;

export function analysisUserPrompt(hypothesis: string, description: string): string {
  return `Hypothesis: ${hypothesis}\n\n${description}`;
}

export function summaryUserPrompt(hypothesis: string, description: string, success: boolean, pValue: number): string {
  return `Hypothesis: ${hypothesis}\n\n${description}\n\nResult: ${success}. p-value: ${pValue.toFixed(6)}`;
}
