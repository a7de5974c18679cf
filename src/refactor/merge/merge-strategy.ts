import { z } from "zod";

/** Merge rules as data: members to drop and domain keywords whose `if` checks are removed. */
export interface MergeStrategy {
  memberRemovals: string[];
  domainKeywords: string[];
}

export const mergeStrategySchema = z.object({
  memberRemovals: z.array(z.string().trim().min(1)).default(["directDbCall"]),
  domainKeywords: z.array(z.string().trim().min(1)).default(["stock", "price", "quantity"])
});

export const defaultMergeStrategy: MergeStrategy = mergeStrategySchema.parse({});

export function mentionsDomainKeyword(text: string, keywords: readonly string[]): boolean {
  const normalized = text.toLowerCase();
  return keywords.some((keyword) => keyword.length > 0 && normalized.includes(keyword.toLowerCase()));
}

export function removesMember(strategy: MergeStrategy, name: string): boolean {
  return strategy.memberRemovals.includes(name);
}
