export * from './types.js';
export { Chunker, DEFAULT_CHUNKING_OPTIONS, fragmentId } from './chunker.js';
export { Embedder, DEFAULT_EMBEDDING_BATCH_SIZE, toBatches } from './embedder.js';
export {
  OpenAIEmbeddingProvider,
  knownEmbeddingDimensions,
  type OpenAIEmbeddingOptions,
} from './embedding-providers.js';
export { LanceVectorStore, createLanceStore } from './lance-store.js';
export { extractPages, sanitizeText } from './text-extractor.js';
export {
  AnswerSynthesizer,
  NO_CONTEXT_ANSWER,
  SYSTEM_PROMPT,
  buildContext,
  buildUserPrompt,
  type SynthesizedAnswer,
} from './synthesizer.js';
