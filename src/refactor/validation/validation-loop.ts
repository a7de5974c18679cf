import { ConfigurationError, errorMessage } from "../../lib/errors.js";
import { logDebug } from "../../lib/logging.js";
import { ChatMessage, Transformer, TransformerResult } from "../../lib/providers.js";
import { Chunk, ChunkVerdict, GenerationAttempt } from "../../types.js";
import { formatParseError, parseSource } from "./structural-parser.js";
import { parseVerdict } from "./verdict.js";

export type LoopState = "drafting" | "awaiting-model" | "validating" | "accepted" | "correcting" | "exhausted";

export const fallbackAnnotation = "// arch-repair: fallback, unparseable, needs manual attention";

export const defaultSystemPrompt = [
  "You review TypeScript and JavaScript source for architectural violations:",
  "layering breaks, domain logic leaking into infrastructure, direct persistence access from domain code.",
  'Answer with exactly one JSON object {"violation": boolean, "reason": string, "fix": string}.',
  "When there is a violation, fix holds the corrected source of the chunk; otherwise fix is an empty string."
].join(" ");

export const defaultBasePrompt =
  "Check the source chunk below against domain-driven design and hexagonal layering rules and return your verdict.";

const verdictShapeHint = '{"violation": boolean, "reason": string, "fix": string}';

export function exhaustedFallbackFix(chunkText: string): string {
  return `${fallbackAnnotation}\n/*\n${chunkText.replaceAll("*/", "*\\/")}\n*/`;
}

export function buildInitialMessages(
  chunk: Chunk,
  context: string,
  prompts: { systemPrompt: string; basePrompt: string }
): ChatMessage[] {
  const sections = [prompts.basePrompt];
  if (context.trim()) {
    sections.push(`//=== Reference Context ===\n${context}`);
  }
  sections.push(`//=== Source Chunk (${chunk.unitId} #${chunk.index}) ===\n${chunk.text}`);

  return [
    { role: "system", content: prompts.systemPrompt },
    { role: "user", content: sections.join("\n\n") }
  ];
}

export interface ValidationLoopOptions {
  transformer: Transformer;
  systemPrompt?: string;
  basePrompt?: string;
  model?: string;
  onAttempt?: (attempt: GenerationAttempt) => void;
}

interface Correction {
  rawOutput: string | null;
  feedback: string;
  failure: string;
}

/**
 * Bounded generate/validate/correct cycle for one chunk. Every run owns its
 * conversation; nothing is shared between chunks.
 */
export class ValidationLoop {
  private readonly transformer: Transformer;
  private readonly systemPrompt: string;
  private readonly basePrompt: string;
  private readonly model: string | undefined;
  private readonly onAttempt: ((attempt: GenerationAttempt) => void) | undefined;

  constructor(options: ValidationLoopOptions) {
    this.transformer = options.transformer;
    this.systemPrompt = options.systemPrompt ?? defaultSystemPrompt;
    this.basePrompt = options.basePrompt ?? defaultBasePrompt;
    this.model = options.model;
    this.onAttempt = options.onAttempt;
  }

  async run(chunk: Chunk, context: string, maxAttempts: number, signal?: AbortSignal): Promise<ChunkVerdict> {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigurationError("Invalid validation options", [`maxAttempts must be >= 1 (got ${String(maxAttempts)})`]);
    }

    const messages = buildInitialMessages(chunk, context, {
      systemPrompt: this.systemPrompt,
      basePrompt: this.basePrompt
    });
    let attempt = 0;
    let lastFailure = "no attempt made";
    let state: LoopState = "drafting";

    while (state !== "exhausted") {
      if (attempt >= maxAttempts) {
        state = this.transition(chunk, state, "exhausted");
        break;
      }

      attempt += 1;
      state = this.transition(chunk, state, "awaiting-model");
      const result = await this.callModel(messages, signal);

      state = this.transition(chunk, state, "validating");
      const evaluation = this.evaluate(chunk, attempt, result);

      if (evaluation.kind === "accepted") {
        this.transition(chunk, state, "accepted");
        return {
          kind: "accepted",
          chunkIndex: chunk.index,
          violation: evaluation.violation,
          reason: evaluation.reason,
          fix: evaluation.fix,
          attempts: attempt
        };
      }

      state = this.transition(chunk, state, "correcting");
      lastFailure = evaluation.correction.failure;
      if (evaluation.correction.rawOutput !== null) {
        messages.push({ role: "assistant", content: evaluation.correction.rawOutput });
      }
      messages.push({ role: "user", content: evaluation.correction.feedback });
      state = this.transition(chunk, state, "drafting");
    }

    return {
      kind: "exhausted",
      chunkIndex: chunk.index,
      violation: true,
      reason: `max attempts reached (${maxAttempts}): ${lastFailure}`,
      fix: exhaustedFallbackFix(chunk.text),
      attempts: attempt
    };
  }

  private async callModel(messages: ChatMessage[], signal?: AbortSignal): Promise<TransformerResult> {
    if (signal?.aborted) {
      return { ok: false, reason: "run cancelled" };
    }
    try {
      return await this.transformer.generate({ messages: [...messages], model: this.model, signal });
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }

  private evaluate(
    chunk: Chunk,
    attempt: number,
    result: TransformerResult
  ):
    | { kind: "accepted"; violation: boolean; reason: string; fix: string }
    | { kind: "correcting"; correction: Correction } {
    if (!result.ok) {
      this.record({ chunkIndex: chunk.index, attempt, rawOutput: null, outcome: "malformed", feedback: result.reason });
      return {
        kind: "correcting",
        correction: {
          rawOutput: null,
          failure: `transformer unavailable: ${result.reason}`,
          feedback: `The previous request did not complete (${result.reason}). Produce exactly one well-formed verdict object ${verdictShapeHint} and nothing else.`
        }
      };
    }

    const parsed = parseVerdict(result.text);
    if (!parsed.ok) {
      const feedback = `Produce exactly one well-formed verdict object ${verdictShapeHint} and nothing else. Problem: ${parsed.problem}.`;
      this.record({ chunkIndex: chunk.index, attempt, rawOutput: result.text, outcome: "malformed", feedback });
      return {
        kind: "correcting",
        correction: { rawOutput: result.text, failure: `malformed verdict: ${parsed.problem}`, feedback }
      };
    }

    const verdict = parsed.verdict;
    if (!verdict.violation || verdict.fix.trim() === "") {
      this.record({ chunkIndex: chunk.index, attempt, rawOutput: result.text, verdict, outcome: "accepted" });
      return { kind: "accepted", violation: verdict.violation, reason: verdict.reason, fix: verdict.fix };
    }

    const parseResult = parseSource(verdict.fix, chunk.unitId);
    if (parseResult.ok) {
      this.record({ chunkIndex: chunk.index, attempt, rawOutput: result.text, verdict, outcome: "accepted" });
      return { kind: "accepted", violation: true, reason: verdict.reason, fix: verdict.fix };
    }

    const location = formatParseError(parseResult.error);
    const feedback =
      `The fix does not parse (${location}). Return the same verdict with a fix that is ASCII-only, ` +
      "comment-free source that parses on its own, with no surrounding prose.";
    this.record({ chunkIndex: chunk.index, attempt, rawOutput: result.text, verdict, outcome: "rejected", feedback });
    return {
      kind: "correcting",
      correction: { rawOutput: result.text, failure: `fix does not parse: ${location}`, feedback }
    };
  }

  private record(attempt: GenerationAttempt): void {
    this.onAttempt?.(attempt);
  }

  private transition(chunk: Chunk, from: LoopState, to: LoopState): LoopState {
    logDebug("validation_loop_transition", { unitId: chunk.unitId, chunkIndex: chunk.index, from, to });
    return to;
  }
}
