/**
 * Query Pipeline
 * Validate → embed → retrieve → synthesize, with failures folded into an
 * explicit result that is converted to an HTTP-style response at the edge.
 */

import { z } from 'zod';
import { ValidationError, classifyError, errorMessage, type ErrorKind } from '../errors.js';
import type { Embedder } from '../rag/embedder.js';
import { NO_CONTEXT_ANSWER, type AnswerSynthesizer } from '../rag/synthesizer.js';
import type { RetrievalMatch, VectorStoreAdapter } from '../rag/types.js';

export const CORS_HEADERS: Readonly<Record<string, string>> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
  'Access-Control-Allow-Methods': 'OPTIONS,POST,GET',
  'Content-Type': 'application/json',
};

export const QUESTION_REQUIRED = 'Question is required';
export const INTERNAL_ERROR = 'Internal server error';

export type QueryStage = 'received' | 'validated' | 'embedded' | 'retrieved';

export type QueryResult =
  | { kind: 'answered'; question: string; answer: string; sources: RetrievalMatch[]; model: string }
  | { kind: 'no_context'; question: string }
  | { kind: 'rejected'; reason: string }
  | { kind: 'failed'; stage: QueryStage; errorKind: ErrorKind; message: string };

export interface QueryResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

export interface QueryRequest {
  method?: string;
  body?: unknown;
}

const queryBodySchema = z.object({
  question: z.string().default(''),
});

/**
 * Pull a trimmed question out of a request body. Returns '' when absent or unusable.
 */
export function readQuestion(body: unknown): string {
  const parsed = queryBodySchema.safeParse(body ?? {});
  return parsed.success ? parsed.data.question.trim() : '';
}

/**
 * Like readQuestion, but an empty question is a ValidationError.
 */
export function requireQuestion(body: unknown): string {
  const question = readQuestion(body);
  if (!question) {
    throw new ValidationError(QUESTION_REQUIRED);
  }
  return question;
}

function respond(statusCode: number, body: Record<string, unknown>): QueryResponse {
  return { statusCode, headers: { ...CORS_HEADERS }, body };
}

/**
 * Map a pipeline result onto the external response contract.
 */
export function toQueryResponse(result: QueryResult): QueryResponse {
  switch (result.kind) {
    case 'answered':
      return respond(200, {
        answer: result.answer,
        question: result.question,
        sources: result.sources,
        model: result.model,
      });
    case 'no_context':
      return respond(200, {
        answer: NO_CONTEXT_ANSWER,
        sources: [],
        question: result.question,
      });
    case 'rejected':
      return respond(400, { error: result.reason });
    case 'failed':
      return respond(500, { error: INTERNAL_ERROR });
  }
}

export interface QueryPipelineDeps {
  embedder: Embedder;
  store: VectorStoreAdapter;
  synthesizer: AnswerSynthesizer;
  topK: number;
}

export class QueryPipeline {
  private embedder: Embedder;
  private store: VectorStoreAdapter;
  private synthesizer: AnswerSynthesizer;
  private topK: number;

  constructor(deps: QueryPipelineDeps) {
    this.embedder = deps.embedder;
    this.store = deps.store;
    this.synthesizer = deps.synthesizer;
    this.topK = deps.topK;
  }

  /**
   * Answer a question from a request body. Never throws.
   */
  async answer(body: unknown, logPrefix: string = '[Query]'): Promise<QueryResult> {
    let stage: QueryStage = 'received';

    try {
      const question = requireQuestion(body);
      stage = 'validated';
      console.log(`${logPrefix} Question received: ${question}`);

      const vector = await this.embedder.embedQuestion(question);
      stage = 'embedded';

      const sources = await this.store.query(vector, this.topK);
      stage = 'retrieved';
      console.log(`${logPrefix} Retrieved ${sources.length} context chunks`);

      if (sources.length === 0) {
        return { kind: 'no_context', question };
      }

      const { answer } = await this.synthesizer.synthesize(question, sources);
      console.log(`${logPrefix} Answer generated: ${answer.slice(0, 100)}...`);

      return { kind: 'answered', question, answer, sources, model: this.synthesizer.model };
    } catch (error) {
      if (error instanceof ValidationError) {
        return { kind: 'rejected', reason: error.message };
      }
      console.error(`${logPrefix} Failed after stage '${stage}':`, error);
      return { kind: 'failed', stage, errorKind: classifyError(error), message: errorMessage(error) };
    }
  }

  /**
   * Entry point for the HTTP trigger. Answers CORS preflight directly.
   */
  async handle(request: QueryRequest, logPrefix?: string): Promise<QueryResponse> {
    if (request.method?.toUpperCase() === 'OPTIONS') {
      return respond(200, { message: 'OK' });
    }
    return toQueryResponse(await this.answer(request.body, logPrefix));
  }
}
