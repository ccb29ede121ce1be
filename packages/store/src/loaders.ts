import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import mammoth from 'mammoth'
import { extractText, getDocumentProxy } from 'unpdf'

/**
 * Raw text of one document, before cleaning
 */
export type DocumentLoader = (file: string) => Promise<string>

export async function loadPlainText(file: string): Promise<string> {
  return readFile(file, 'utf8')
}

/**
 * Text of every page, pages separated by a blank line
 */
export async function loadPdfText(file: string): Promise<string> {
  const pdf = await getDocumentProxy(new Uint8Array(await readFile(file)))
  const { text } = await extractText(pdf, { mergePages: false })
  const pages: readonly string[] = Array.isArray(text) ? text : [text]
  return pages.join('\n\n')
}

/**
 * Paragraph text of a Word document; mammoth separates paragraphs with a
 * blank line
 */
export async function loadDocxText(file: string): Promise<string> {
  const { value } = await mammoth.extractRawText({ path: file })
  return value
}

export const DOCUMENT_LOADERS = {
  '.txt': loadPlainText,
  '.md': loadPlainText,
  '.pdf': loadPdfText,
  '.docx': loadDocxText,
} as const satisfies Record<string, DocumentLoader>

export type SupportedExtension = keyof typeof DOCUMENT_LOADERS

function isSupportedExtension(extension: string): extension is SupportedExtension {
  return Object.hasOwn(DOCUMENT_LOADERS, extension)
}

/**
 * Load a document by its extension
 */
export async function loadDocumentText(file: string): Promise<string> {
  const extension = extname(file).toLowerCase()
  if (!isSupportedExtension(extension))
    throw new Error(`Unsupported file extension "${extension}"`)
  return DOCUMENT_LOADERS[extension](file)
}
