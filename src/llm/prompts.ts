/**
 * Prompt templates for LLM calls
 */

export const INSTRUMENT_LOOKUP_SYSTEM_PROMPT = `You are a clinical outcomes research expert. Your task is to list the validated outcome instruments used to measure treatment efficacy in a given disease.

Requirements:
- Use the instrument's standard abbreviation as its name (e.g., "ACR50", "PASI75", "SLEDAI-2K")
- Score each instrument's quality from 1 to 10:
  - 10: regulatory gold standard, accepted as a primary endpoint in pivotal trials
  - 8-9: validated and widely used, accepted as a key secondary endpoint
  - 6-7: validated but less commonly used, or a general-purpose measure
  - 1-5: partially validated or investigator-defined
- Classify each instrument's type
- Mark whether regulators (FDA/EMA) accept it as a registrational endpoint

List only instruments you are confident exist. Prefer fewer, well-established instruments over speculative ones.`;

export function createInstrumentLookupUserPrompt(disease: string): string {
  return `List the validated efficacy outcome instruments for:

Disease: ${disease}

Provide:
1. The canonical disease name
2. Up to 15 instruments with name, quality score (1-10), type, and regulatory acceptance`;
}
