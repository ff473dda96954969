/**
 * Answer Synthesizer
 * Builds a grounded prompt from retrieved fragments and asks the chat model
 * for a cited answer.
 */

import type { LLMProvider } from '../llm/types.js';
import type { RetrievalMatch } from './types.js';

export const CONTEXT_DELIMITER = '\n\n---\n\n';

export const NO_CONTEXT_ANSWER =
  'I could not find relevant information in the documents. Please upload a PDF first.';

export const SYSTEM_PROMPT = `You are an expert AI assistant. Answer questions based ONLY on the provided context.
If the context doesn't contain enough information, say so clearly.
Always cite the source and page numbers when referencing information.
Be concise, accurate, and helpful.`;

// Low temperature: answers should stick to the context
export const ANSWER_TEMPERATURE = 0.3;
export const ANSWER_MAX_TOKENS = 800;

export function formatCitation(match: RetrievalMatch): string {
  return `[Source: ${match.source}, Pages: [${match.pages.join(', ')}]]`;
}

/**
 * Concatenate matches, most relevant first, each under its citation header.
 */
export function buildContext(matches: RetrievalMatch[]): string {
  return matches.map((match) => `${formatCitation(match)}\n${match.text}`).join(CONTEXT_DELIMITER);
}

export function buildUserPrompt(question: string, context: string): string {
  return `Context from the document:
${context}

Question: ${question}

Answer based on the context above:`;
}

export interface SynthesizedAnswer {
  answer: string;
  /** False when the fallback was returned without calling the model */
  usedModel: boolean;
}

export class AnswerSynthesizer {
  private llm: LLMProvider;

  constructor(llm: LLMProvider) {
    this.llm = llm;
  }

  get model(): string {
    return this.llm.model;
  }

  async synthesize(question: string, matches: RetrievalMatch[]): Promise<SynthesizedAnswer> {
    if (matches.length === 0) {
      return { answer: NO_CONTEXT_ANSWER, usedModel: false };
    }

    const response = await this.llm.complete(
      [{ role: 'user', content: buildUserPrompt(question, buildContext(matches)) }],
      {
        systemPrompt: SYSTEM_PROMPT,
        temperature: ANSWER_TEMPERATURE,
        maxTokens: ANSWER_MAX_TOKENS,
      }
    );

    return { answer: response.content, usedModel: true };
  }
}
