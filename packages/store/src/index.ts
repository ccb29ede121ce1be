// Document store
export { compareRetrievedChunks, rankChunks } from './document-store'
export type { DocumentSearchOptions, DocumentStore } from './document-store'
export { VectorDocumentStore } from './vector-document-store'
export type { VectorDocumentStoreOptions } from './vector-document-store'

// Vector store
export { LocalVectorStore, VECTOR_INDEX_FILE } from './local/vector-store'
export type { LocalVectorStoreOptions } from './local/vector-store'
export { ChunkMetadataSchema, ChunkVectorSchema } from './vector-store'
export type { ChunkHit, ChunkMetadata, ChunkVector, VectorStore } from './vector-store'

// Embeddings
export { AISDKEmbedding, createEmbedding, Embedding, MockEmbedding } from './embedding'
export type { AISDKEmbeddingConfig, EmbeddingVector, EmbedOptions } from './embedding'
export { EmbeddingSimilarity } from './similarity'

// Ingestion
export {
  ChunkFileSchema,
  chunkText,
  cleanNoise,
  DEFAULT_MAX_CHUNK_CHARS,
  discoverDocuments,
  ingestDirectory,
  ingestFile,
  loadChunkDirectory,
  loadChunkFile,
  removeInlineCitations,
  removeReferenceSection,
  saveChunks,
  SUPPORTED_EXTENSIONS,
} from './ingestion'
export type { ChunkFile, IngestOptions, IngestResult } from './ingestion'
export { DOCUMENT_LOADERS, loadDocumentText, loadDocxText, loadPdfText, loadPlainText } from './loaders'
export type { DocumentLoader, SupportedExtension } from './loaders'

// Types
export { DocumentChunkSchema, RetrievalContextSchema, RetrievedChunkSchema } from './types'
export type { DocumentChunk, RetrievalContext, RetrievedChunk } from './types'
