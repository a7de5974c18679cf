import path from "node:path";
import { collectFiles, readTextFile } from "../../lib/fs-utils.js";
import { stableId } from "../../lib/hashing.js";
import { logInfo, logWarn, serializeError } from "../../lib/logging.js";
import { ChunkMode, ReferenceMetadata } from "../../types.js";
import { splitText } from "../chunking/chunker.js";
import { IndexableDocument, RagService } from "./rag-service.js";

export type ContentType = "code" | "markdown" | "text";

const codeExtensions = new Set(["ts", "tsx", "mts", "cts", "js", "jsx", "mjs", "cjs", "java", "kt", "py", "go", "cs"]);

export function detectContentType(fileName: string): ContentType {
  const extension = path.extname(fileName).toLowerCase().replace(/^\./, "");
  if (codeExtensions.has(extension)) {
    return "code";
  }
  if (extension === "md" || extension === "markdown") {
    return "markdown";
  }
  return "text";
}

function chunkModeFor(contentType: ContentType): ChunkMode {
  return contentType === "code" ? "line" : "paragraph";
}

export interface DocumentProcessorOptions {
  /** Characters for prose, lines for code. */
  chunkSize: number;
  chunkOverlap: number;
}

/** Splits reference documents into chunks and indexes them through the RagService. */
export class DocumentProcessor {
  private readonly rag: RagService;
  private readonly options: DocumentProcessorOptions;

  constructor(rag: RagService, options: DocumentProcessorOptions) {
    this.rag = rag;
    this.options = options;
  }

  toDocuments(title: string, content: string, contentType: ContentType, metadata: ReferenceMetadata = {}): IndexableDocument[] {
    const chunks = splitText(title, content, {
      maxSize: this.options.chunkSize,
      overlap: this.options.chunkOverlap,
      mode: chunkModeFor(contentType)
    });

    return chunks.map((chunk) => ({
      id: stableId("doc", title, chunk.index),
      title: chunks.length > 1 ? `${title} (chunk ${chunk.index + 1} of ${chunks.length})` : title,
      content: chunk.text,
      metadata: {
        ...metadata,
        content_type: contentType,
        chunk_count: chunks.length,
        chunk_index: chunk.index
      }
    }));
  }

  async processDocument(
    title: string,
    content: string,
    contentType: ContentType,
    metadata: ReferenceMetadata = {}
  ): Promise<boolean> {
    const documents = this.toDocuments(title, content, contentType, metadata);
    if (documents.length === 0) {
      return false;
    }

    const indexed = await this.rag.indexDocuments(documents);
    if (indexed !== documents.length) {
      logWarn("reference_document_partially_indexed", { title, chunks: documents.length, indexed });
      return false;
    }
    return true;
  }

  async processFile(filePath: string, metadata: ReferenceMetadata = {}, title = path.basename(filePath)): Promise<boolean> {
    let content: string;
    try {
      content = await readTextFile(filePath);
    } catch (error) {
      logWarn("reference_document_unreadable", { filePath, error: serializeError(error) });
      return false;
    }

    return this.processDocument(title, content, detectContentType(filePath), { ...metadata, path: filePath });
  }

  /** Returns the number of files fully indexed. */
  async processDirectory(directory: string, extensions: string[]): Promise<number> {
    const files = await collectFiles(directory, { extensions });
    let processed = 0;

    for (const file of files) {
      if (await this.processFile(file.absolutePath, { source: "directory_scan" }, file.relativePath)) {
        processed += 1;
      }
    }

    logInfo("reference_directory_indexed", { directory, files: files.length, processed });
    return processed;
  }
}
