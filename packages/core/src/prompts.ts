/**
 * Prompt templates for reformulation and grounded answering.
 * Each builder takes the assistant's subject domain (ASSISTANT_DOMAIN).
 */

export const FALLBACK_ANSWER =
  "I encountered an error processing your question. Please try rephrasing or ask a different question.";

export function buildSystemPrompt(domain: string): string {
  return `You are a knowledgeable assistant specialising in ${domain}.
Your role is to provide accurate, helpful, and well-informed answers based on the provided context from authoritative documents.

Inputs:
- User question: the question as the user asked it
- Context from documents: relevant excerpts from retrieved documents with their source filenames

Guidelines:
- Provide clear, accurate answers based on the context
- Your answer should directly address the user's question
- If the context doesn't contain enough information, acknowledge this limitation
- Use specific examples from the context when relevant
- Do not make up information that isn't supported by the context
- Keep your answer concise and focused on the user's question
- Use bullet points or numbered lists for clarity when appropriate`;
}

export function buildReformulationPrompt(userQuery: string, domain: string): string {
  return `You are an assistant helping users find information about ${domain}.

The user has asked: "${userQuery}"

Reformulate this query to be more comprehensive and likely to match relevant content in documents about ${domain}.
Add related terms, expand acronyms, and make the query more specific to the subject.

Return only the reformulated query, nothing else.`;
}

export function buildAnswerPrompt(userQuery: string, context: string): string {
  return `Context from documents:
${context}

User Question: ${userQuery}

Provide a comprehensive answer based on the context above.
If the context doesn't fully address the question,
mention what information is available and what might be missing.`;
}
