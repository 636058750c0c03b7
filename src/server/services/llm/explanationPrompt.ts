export const CONTEXT_EXCERPT_LENGTH = 2000;

export interface ExplanationRequest {
  term: string;
  localDefinition: string;
  documentContext: string;
  targetLanguage: string;
}

export function buildExplanationPrompt(request: ExplanationRequest): string {
  const { term, localDefinition, documentContext, targetLanguage } = request;
  const excerpt = documentContext.slice(0, CONTEXT_EXCERPT_LENGTH);

  return `Act as a warm, culturally sensitive medical guide for a patient who speaks ${targetLanguage}.

TASK: Explain the term "${term}" to the patient.

CONTEXT:
- Document Excerpt: "${excerpt}"
- Technical Definition: "${localDefinition}"

CULTURAL GUIDELINES:
1. **Reassurance:** Medical terms can be scary. Use calming language.
2. **Simplicity:** Use analogies relevant to daily life.
3. **Action:** Focus on what they can DO (diet, rest).

OUTPUT FORMAT (Strictly follow this):

### ${targetLanguage} Explanation
(Provide a culturally appropriate, respectful explanation in ${targetLanguage}.)

---

### English Explanation
* **What is it?** (Simple explanation)
* **Why is it here?** (Context from doc)
* **Advice:** (Actionable steps)
`;
}
