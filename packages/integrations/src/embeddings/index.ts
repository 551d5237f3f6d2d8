export { OllamaEmbeddingClient } from './ollama.js'
export type { OllamaEmbeddingOptions } from './ollama.js'
export { OpenAIEmbeddingClient } from './openai.js'
