/**
 * Read-only tag analytics over candidates already in Teamtailor, plus the
 * small tag editing surface the dashboard uses.
 */

import { logger } from "@infra/logger";
import { describeError } from "@server/services/http/errors";
import type {
  AvailableTags,
  CandidateTags,
  TagCount,
  TagUpdateResult,
  TeamtailorAnalytics,
} from "@shared/types";
import { getArray, getString, toStringOrNull } from "@shared/utils/records";
import { z } from "zod";
import {
  getTeamtailorClient,
  type TeamtailorClient,
  type TeamtailorResource,
} from "./client";
import tagCategoriesJson from "./tag-categories.json";

const log = logger.child({ service: "teamtailor-analytics" });

export const DEFAULT_MAX_CANDIDATES = 500;
export const TOP_TAGS = 15;
const AVAILABLE_TAGS_SAMPLE = 100;
const IGNORED_TAG_PREFIX = "language_";

const TAG_CATEGORIES = z.record(z.array(z.string())).parse(tagCategoriesJson);

export function candidateTagList(candidate: TeamtailorResource): string[] {
  return getArray(candidate.attributes, "tags")
    .map((tag) => toStringOrNull(tag))
    .filter((tag): tag is string => tag !== null);
}

export function percentage(count: number, total: number): number {
  return total > 0 ? Math.round((count / total) * 10_000) / 100 : 0;
}

export function summarizeTags(
  candidates: TeamtailorResource[],
  maxCandidates: number,
): TeamtailorAnalytics {
  const counts = new Map<string, number>();
  for (const candidate of candidates) {
    for (const tag of candidateTagList(candidate)) {
      if (tag.toLowerCase().startsWith(IGNORED_TAG_PREFIX)) continue;
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }

  const sorted: TagCount[] = [...counts.entries()]
    .map(([tag, count]) => ({ tag, count }))
    .sort((a, b) => b.count - a.count || a.tag.localeCompare(b.tag));

  const lowercaseCounts = new Map<string, number>();
  for (const { tag, count } of sorted) {
    const key = tag.toLowerCase();
    lowercaseCounts.set(key, (lowercaseCounts.get(key) ?? 0) + count);
  }

  const total = candidates.length;
  const tagCategories: TeamtailorAnalytics["tagCategories"] = {};
  for (const [category, tags] of Object.entries(TAG_CATEGORIES)) {
    const count = tags.reduce((sum, tag) => sum + (lowercaseCounts.get(tag) ?? 0), 0);
    tagCategories[category] = { count, percentage: percentage(count, total) };
  }

  return {
    totalCandidates: total,
    topTags: sorted.slice(0, TOP_TAGS),
    tagDistribution: Object.fromEntries(sorted.map(({ tag, count }) => [tag, count])),
    tagCategories,
    maxCandidates,
  };
}

export async function getTeamtailorAnalytics(
  options: { maxCandidates?: number; client?: TeamtailorClient } = {},
): Promise<TeamtailorAnalytics> {
  const maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES;
  const client = options.client ?? getTeamtailorClient();
  const candidates = await client.listAll("/candidates", {}, { maxItems: maxCandidates });
  return summarizeTags(candidates, maxCandidates);
}

export async function getAvailableTags(
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<AvailableTags> {
  const candidates = await client.listAll(
    "/candidates",
    {},
    { maxItems: AVAILABLE_TAGS_SAMPLE },
  );
  const tags = [...new Set(candidates.flatMap(candidateTagList))].sort();
  return { tags, total: tags.length };
}

function toCandidateTags(candidate: TeamtailorResource): CandidateTags {
  const name = [
    getString(candidate.attributes, "first-name"),
    getString(candidate.attributes, "last-name"),
  ]
    .filter((part): part is string => part !== null)
    .join(" ");
  return {
    candidateId: candidate.id,
    candidateName: name || null,
    email: getString(candidate.attributes, "email"),
    tags: candidateTagList(candidate),
  };
}

export async function getCandidateTags(
  candidateId: string,
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<CandidateTags> {
  return toCandidateTags(
    await client.getResource(`/candidates/${encodeURIComponent(candidateId)}`),
  );
}

export function mergeTags(existing: string[], added: string[]): string[] {
  const seen = new Set(existing.map((tag) => tag.toLowerCase()));
  const merged = [...existing];
  for (const tag of added) {
    const key = tag.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(tag);
  }
  return merged;
}

export async function addTagsToCandidates(
  input: { tags: string[]; candidateIds: string[] },
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<TagUpdateResult> {
  const result: TagUpdateResult = {
    success: 0,
    failed: 0,
    total: input.candidateIds.length,
    errors: [],
  };
  for (const candidateId of input.candidateIds) {
    try {
      const current = await getCandidateTags(candidateId, client);
      await client.update("candidates", current.candidateId, {
        tags: mergeTags(current.tags, input.tags),
      });
      result.success++;
    } catch (error) {
      const message = describeError(error);
      log.warn("Adding tags failed", { candidateId, error: message });
      result.failed++;
      result.errors.push(`${candidateId}: ${message}`);
    }
  }
  return result;
}
