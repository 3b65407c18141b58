/**
 * Prompt templates shared by the pipeline stages
 *
 * Every template opens with a distinct first line; the gateway cache is keyed on
 * the full prompt text.
 */

const REASONING_INSTRUCTION = 'You are a helpful assistant. Answer the following question step by step.';

const REASONING_VARIANTS: Record<string, string> = {
  fever: `Decide whether the claim is supported or refuted by what you know, or whether there is not enough information.
Reason about the facts involved before deciding.
End with "Answer: SUPPORTS", "Answer: REFUTES" or "Answer: NOT ENOUGH INFO".`,
  hotpotqa: `This question needs several facts combined. Identify each entity involved, state what you know about it, and connect the facts.
End with "Answer: <short answer>" giving only the entity, date or number asked for.`,
  multiple_choice: `Consider each option in turn and rule out the wrong ones.
End with "Answer: <letter>" giving only the letter of the correct option.`,
  default: `Think about what information is needed to answer this question. Break down the problem and provide your reasoning.
End with "Answer: <short answer>".`,
};

function reasoningVariant(datasetHint?: string): string {
  if (!datasetHint) return REASONING_VARIANTS.default;
  const hint = datasetHint.toLowerCase();
  if (hint === 'fever') return REASONING_VARIANTS.fever;
  if (hint === 'hotpotqa') return REASONING_VARIANTS.hotpotqa;
  if (hint === 'medmcqa' || hint.startsWith('mmlu')) return REASONING_VARIANTS.multiple_choice;
  return REASONING_VARIANTS.default;
}

export function reasoningPrompt(question: string, attempt: number, total: number, datasetHint?: string): string {
  return `${REASONING_INSTRUCTION}

Question: ${question}

${reasoningVariant(datasetHint)}
(Independent reasoning attempt ${attempt} of ${total}.)

Reasoning:`;
}

export function domainPrompt(question: string): string {
  return `Identify the knowledge domains relevant to answer this question.

Available domains: [factual, medical, physics, biology]

Question: ${question}

Relevant domains (select from the list):`;
}

export function consensusValidationPrompt(question: string, answer: string): string {
  return `Check whether a proposed answer actually answers a question.

Question: ${question}
Proposed answer: ${answer}

Does the proposed answer directly and plausibly answer the question? Reply with "yes" or "no" only.`;
}

export function sparqlPrompt(sentence: string): string {
  return `Convert this sentence to a SPARQL query for Wikidata. The query should retrieve relevant entities and facts.
Use rdfs:label with "@en" literals to find entities by name. Return only the query.

Sentence: ${sentence}

SPARQL Query:`;
}

export function medicalQueryPrompt(sentence: string): string {
  return `Extract key medical information from this sentence as a short encyclopedia search query.

Sentence: ${sentence}

Key medical terms and concepts:`;
}

export function searchQueryPrompt(sentence: string): string {
  return `Extract the main search query from this sentence.

Sentence: ${sentence}

Search query:`;
}

export function correctionPrompt(rationale: string, evidence: string, priorContext = ''): string {
  const context = priorContext ? `${priorContext}\n` : '';
  return `Given the supporting knowledge, correct or improve the following rationale to make it more accurate.
Keep the reasoning consistent with the previous corrected steps when they are given.

${context}Original Rationale: ${rationale}

Supporting Knowledge:
${evidence}

Corrected Rationale:`;
}

export function consolidationPrompt(question: string, transcript: string): string {
  return `Based on the following reasoning steps, provide a concise final answer to the question.

Question: ${question}

Reasoning steps:
${transcript}

IMPORTANT: Provide ONLY the answer, nothing else.
- For multiple choice (A, B, C, D): provide only the letter.
- For factual questions: provide only the specific fact or entity name.
- Do NOT include explanations, reasoning, or additional text.

Final Answer:`;
}

export function claimConsolidationPrompt(question: string, transcript: string): string {
  return `Decide the verification label for a claim from the following reasoning steps.

${question}

Reasoning steps:
${transcript}

Reply with exactly one label:
- SUPPORTS if the reasoning shows the claim is true
- REFUTES if the reasoning shows the claim is false
- NOT ENOUGH INFO if the reasoning cannot settle it

Label:`;
}
