import type { DocumentChunk } from './types'
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises'
import { basename, extname, join, resolve } from 'node:path'
import { createLogger } from '@fm-synth/utils/logger'
import { z } from 'zod/v4'
import { loadDocumentText } from './loaders'
import { DocumentChunkSchema } from './types'

const log = createLogger('Ingestion')

export const SUPPORTED_EXTENSIONS = ['.txt', '.md', '.pdf', '.docx'] as const

export const DEFAULT_MAX_CHUNK_CHARS = 1500

const REFERENCE_HEADINGS = [
  /\n\s*(?:Acknowledgements|References|Bibliography|Citations|Literature Cited|Works Cited)\s*\n/,
  /\n\s*(?:ACKNOWLEDGEMENTS|REFERENCES|BIBLIOGRAPHY|CITATIONS|LITERATURE CITED|WORKS CITED)\s*\n/,
]

/**
 * Cut text from the first reference-style heading onward
 */
export function removeReferenceSection(text: string): string {
  for (const pattern of REFERENCE_HEADINGS) {
    const match = pattern.exec(text)
    if (match)
      return text.slice(0, match.index).trim()
  }
  return text.trim()
}

/**
 * Drop numeric (`[1]`, `[2, 5]`, `(3)`) and author-year (`(Smith et al., 2020)`) citations
 */
export function removeInlineCitations(text: string): string {
  return text
    .replace(/\[\d+(?:,\s*\d+)*\]|\(\d+(?:,\s*\d+)*\)/g, '')
    .replace(/\([^)\n]*?\d{4}[^)\n]*?\)/g, '')
}

/**
 * Strip non-content noise from extracted document text.
 * Paragraph breaks survive as single blank lines.
 */
export function cleanNoise(text: string): string {
  let cleaned = removeReferenceSection(text.replace(/\r\n?/g, '\n'))
  cleaned = removeInlineCitations(cleaned)

  cleaned = cleaned
    .replace(/^(?:chapter|section|appendix)[ \t]+\w+[ \t]*/gim, '')
    .replace(/-[ \t]*\d+[ \t]*-/g, '')
    .replace(/(?:page|pg\.?)[ \t]+\d+(?:[ \t]+of[ \t]+\d+)?/gi, '')
    .replace(/^[ \t]*\d+[ \t]*$/gm, '')
    .replace(/\{\s*\d+\s*\}/g, '')
    .replace(/[ \t]+/g, ' ')
    .replace(/^ +| +$/gm, '')
    .replace(/\n{3,}/g, '\n\n')

  return cleaned.trim()
}

function isTitle(paragraph: string): boolean {
  return !paragraph.includes('\n') && paragraph.length < 80 && !/[.!?:;,]$/.test(paragraph)
}

function splitOversized(paragraph: string, maxChars: number): string[] {
  const sentences = paragraph.match(/[^.!?]+[.!?]*\s*/g) ?? [paragraph]
  const pieces: string[] = []
  let current = ''
  for (const sentence of sentences) {
    if (current.length + sentence.length > maxChars && current.length > 0) {
      pieces.push(current.trim())
      current = ''
    }
    current += sentence
    while (current.length > maxChars) {
      pieces.push(current.slice(0, maxChars).trim())
      current = current.slice(maxChars)
    }
  }
  if (current.trim().length > 0)
    pieces.push(current.trim())
  return pieces
}

/**
 * Split cleaned text into chunks of whole paragraphs.
 *
 * A short single-line paragraph without closing punctuation is treated as a
 * section title and always opens a new chunk. Paragraphs longer than
 * `maxChars` are split at sentence ends.
 */
export function chunkText(text: string, sourceId: string, maxChars = DEFAULT_MAX_CHUNK_CHARS): DocumentChunk[] {
  const paragraphs = text
    .split(/\n\s*\n/)
    .map(p => p.trim())
    .filter(p => p.length > 0)
    .flatMap(p => (p.length > maxChars ? splitOversized(p, maxChars) : [p]))

  const bodies: string[] = []
  let current: string[] = []
  let length = 0
  const flush = (): void => {
    if (current.length > 0)
      bodies.push(current.join('\n\n'))
    current = []
    length = 0
  }

  for (const paragraph of paragraphs) {
    const separator = current.length > 0 ? 2 : 0
    const currentIsTitleOnly = current.length === 1 && isTitle(current[0] ?? '')
    if (isTitle(paragraph) && !currentIsTitleOnly)
      flush()
    else if (length + separator + paragraph.length > maxChars)
      flush()
    current.push(paragraph)
    length += (current.length > 1 ? 2 : 0) + paragraph.length
  }
  flush()

  return bodies.map((body, i) => ({
    chunkId: `${sourceId}::chunk::${i}`,
    sourceId,
    text: body,
  }))
}

/**
 * Supported files directly inside `dir`, sorted by name
 */
export async function discoverDocuments(
  dir: string,
  extensions: readonly string[] = SUPPORTED_EXTENSIONS,
): Promise<string[]> {
  const root = resolve(dir)
  const entries = await readdir(root, { withFileTypes: true })
  const wanted = new Set(extensions.map(e => e.toLowerCase()))
  return entries
    .filter(e => e.isFile() && wanted.has(extname(e.name).toLowerCase()))
    .map(e => join(root, e.name))
    .sort()
}

export const ChunkFileSchema = z.object({
  source: z.string(),
  numChunks: z.number().int().nonnegative(),
  chunks: z.array(DocumentChunkSchema),
})

export type ChunkFile = z.infer<typeof ChunkFileSchema>

/**
 * Write `<outDir>/<sourceId>.chunks.json`
 */
export async function saveChunks(chunks: readonly DocumentChunk[], sourceId: string, outDir: string): Promise<string> {
  await mkdir(outDir, { recursive: true })
  const outputPath = join(outDir, `${basename(sourceId)}.chunks.json`)
  const payload: ChunkFile = { source: basename(sourceId), numChunks: chunks.length, chunks: [...chunks] }
  await writeFile(outputPath, `${JSON.stringify(payload, null, 2)}\n`, 'utf8')
  return outputPath
}

export async function loadChunkFile(path: string): Promise<DocumentChunk[]> {
  const parsed = ChunkFileSchema.safeParse(JSON.parse(await readFile(path, 'utf8')))
  if (!parsed.success)
    throw new Error(`Invalid chunk file ${path}: ${z.prettifyError(parsed.error)}`)
  return parsed.data.chunks
}

/**
 * All chunks from every `*.chunks.json` in `dir`, in file-name order
 */
export async function loadChunkDirectory(dir: string): Promise<DocumentChunk[]> {
  const files = await discoverDocuments(dir, ['.json'])
  const chunks: DocumentChunk[] = []
  for (const file of files.filter(f => f.endsWith('.chunks.json')))
    chunks.push(...await loadChunkFile(file))
  return chunks
}

export interface IngestOptions {
  maxChunkChars?: number
}

export async function ingestFile(
  file: string,
  outDir: string,
  options: IngestOptions = {},
): Promise<{ outputPath: string, chunks: DocumentChunk[] }> {
  const sourceId = basename(file)
  const cleaned = cleanNoise(await loadDocumentText(file))
  const chunks = chunkText(cleaned, sourceId, options.maxChunkChars)
  const outputPath = await saveChunks(chunks, sourceId, outDir)
  log.debug(`${sourceId}: ${chunks.length} chunks -> ${outputPath}`)
  return { outputPath, chunks }
}

export interface IngestResult {
  processed: string[]
  skipped: Array<{ file: string, reason: string }>
  chunks: DocumentChunk[]
}

/**
 * Ingest every supported document of `inputDir`; a file that fails is
 * skipped and reported, the rest still run
 */
export async function ingestDirectory(inputDir: string, outDir: string, options: IngestOptions = {}): Promise<IngestResult> {
  const result: IngestResult = { processed: [], skipped: [], chunks: [] }
  for (const file of await discoverDocuments(inputDir)) {
    try {
      const { outputPath, chunks } = await ingestFile(file, outDir, options)
      result.processed.push(outputPath)
      result.chunks.push(...chunks)
    }
    catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      log.warn(`Skipping ${basename(file)}: ${reason}`)
      result.skipped.push({ file, reason })
    }
  }
  return result
}
