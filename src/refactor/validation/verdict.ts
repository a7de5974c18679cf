import { z } from "zod";
import { ModelVerdict } from "../../types.js";

export const modelVerdictSchema = z
  .object({
    violation: z.boolean(),
    reason: z.string(),
    fix: z.string()
  })
  .strict();

export type VerdictParseResult = { ok: true; verdict: ModelVerdict } | { ok: false; problem: string };

function extractJson(raw: string): unknown {
  const trimmed = raw.trim();
  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  const candidate = fenceMatch?.[1] ?? trimmed;

  try {
    return JSON.parse(candidate);
  } catch {
    const firstBrace = candidate.indexOf("{");
    const lastBrace = candidate.lastIndexOf("}");
    if (firstBrace >= 0 && lastBrace > firstBrace) {
      return JSON.parse(candidate.slice(firstBrace, lastBrace + 1));
    }
    throw new Error("no JSON object found in model output");
  }
}

export function parseVerdict(raw: string): VerdictParseResult {
  let payload: unknown;
  try {
    payload = extractJson(raw);
  } catch (error) {
    return {
      ok: false,
      problem: error instanceof SyntaxError ? `invalid JSON: ${error.message}` : "no JSON object found in model output"
    };
  }

  const parsed = modelVerdictSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return { ok: false, problem: `verdict shape invalid: ${where}${issue?.message ?? "unknown issue"}` };
  }

  return { ok: true, verdict: parsed.data };
}
