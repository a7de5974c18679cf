import { Chunk, SearchHit } from "../../types.js";
import { RagService } from "./rag-service.js";

export interface ContextAssemblerOptions {
  /** 0 keeps the whole chunk text. */
  queryCharLimit: number;
  queryPrefix: string;
}

export function buildRetrievalQuery(chunkText: string, options: ContextAssemblerOptions): string {
  const body = options.queryCharLimit > 0 ? chunkText.slice(0, options.queryCharLimit) : chunkText;
  return `${options.queryPrefix}${body}`;
}

export function formatReferenceContext(hits: SearchHit[], includeCitations: boolean): string {
  const sections: string[] = [];

  for (const hit of hits) {
    const content = hit.metadata.content;
    if (typeof content !== "string" || content.trim() === "") {
      continue;
    }

    const title = typeof hit.metadata.title === "string" && hit.metadata.title ? hit.metadata.title : "Untitled reference";
    const lines = [`// --- ${title} ---`];
    if (includeCitations) {
      lines.push(`// (score ${hit.score.toFixed(3)}, id ${hit.id})`);
    }
    lines.push(content);
    sections.push(lines.join("\n"));
  }

  return sections.join("\n\n");
}

export class ContextAssembler {
  private readonly rag: RagService | null;
  private readonly options: ContextAssemblerOptions;

  constructor(rag: RagService | null, options: ContextAssemblerOptions) {
    this.rag = rag;
    this.options = options;
  }

  async assemble(chunk: Chunk, topK: number): Promise<string> {
    if (!this.rag) {
      return "";
    }

    const hits = await this.rag.findRelevant(buildRetrievalQuery(chunk.text, this.options), topK);
    return formatReferenceContext(hits, this.rag.includeCitations);
  }
}
