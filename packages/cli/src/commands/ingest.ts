import type { Embedding } from '@fm-synth/store'
import type { Command } from 'commander'
import path from 'node:path'
import { ingestDirectory, LocalVectorStore, VectorDocumentStore } from '@fm-synth/store'
import { createLogger } from '@fm-synth/utils/logger'
import { loadProjectConfig, parseNumberFlag } from '../config'
import { resolveEmbedding } from '../providers'

const log = createLogger('ingest')

export interface IngestCommandOptions {
  input: string
  chunksDir: string
  vectorsDir: string
  embedding: Embedding
  maxChunkChars?: number
}

export interface IngestSummary {
  processed: string[]
  skipped: Array<{ file: string, reason: string }>
  indexed: number
}

/**
 * Chunk every document under `input` and index the chunks into the
 * persistent vector store
 */
export async function runIngest(options: IngestCommandOptions): Promise<IngestSummary> {
  const result = await ingestDirectory(options.input, options.chunksDir, { maxChunkChars: options.maxChunkChars })

  const vectorStore = new LocalVectorStore()
  await vectorStore.open({ path: options.vectorsDir })
  try {
    const store = new VectorDocumentStore({ embedding: options.embedding, vectorStore })
    await store.index(result.chunks)
    return { processed: result.processed, skipped: result.skipped, indexed: await store.count() }
  }
  finally {
    await vectorStore.close()
  }
}

export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Clean, chunk and index a directory of .txt/.md documents')
    .argument('<input>', 'Directory of source documents')
    .option('-c, --config <file>', 'Project configuration file')
    .option('--chunks <dir>', 'Chunk output directory')
    .option('--vectors <dir>', 'Vector index directory')
    .option('--embed-model <provider/model>', 'Embedding provider/model (e.g. openai/text-embedding-3-small, mock)')
    .option('--max-chunk-chars <n>', 'Character budget per chunk')
    .action(async (input: string, options: {
      config?: string
      chunks?: string
      vectors?: string
      embedModel?: string
      maxChunkChars?: string
    }) => {
      const project = await loadProjectConfig(process.cwd(), options.config)
      const summary = await runIngest({
        input: path.resolve(input),
        chunksDir: path.resolve(options.chunks ?? project.chunks),
        vectorsDir: path.resolve(options.vectors ?? project.vectors),
        embedding: resolveEmbedding(options.embedModel ?? project.embedding),
        maxChunkChars: parseNumberFlag('max-chunk-chars', options.maxChunkChars) ?? project.maxChunkChars,
      })

      for (const { file, reason } of summary.skipped)
        log.warn(`Skipped ${file}: ${reason}`)
      log.success(`Ingested ${summary.processed.length} documents, ${summary.indexed} chunks indexed`)
    })
}
