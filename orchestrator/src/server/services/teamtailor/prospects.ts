/**
 * Prospect pools in Teamtailor: pool CRUD, pool membership, a completeness
 * summary per pool, and moving exported candidates into a pool.
 */

import { notFound } from "@infra/errors";
import { logger } from "@infra/logger";
import * as idMappings from "@server/repositories/id-mappings";
import { describeError, isHttpError } from "@server/services/http/errors";
import { saveJson } from "@server/services/storage";
import { requireTeamtailorExport } from "@server/services/transform";
import type { ProspectMigrationInput } from "@shared/migration-schema";
import type {
  BulkPoolResult,
  ExportCandidate,
  PoolCandidate,
  PoolCandidatePage,
  PoolMembership,
  ProspectMigrationReport,
  ProspectPool,
  ProspectPoolList,
  ProspectPoolStats,
  TagCount,
  TeamtailorExport,
} from "@shared/types";
import { getNumber, getString } from "@shared/utils/records";
import { candidateTagList, percentage } from "./analytics";
import {
  getTeamtailorClient,
  resourceList,
  type TeamtailorClient,
  type TeamtailorResource,
} from "./client";
import { candidateAttributes } from "./payloads";

const log = logger.child({ service: "teamtailor-prospects" });

const STATS_MAX_CANDIDATES = 1000;
const STATS_TOP_TAGS = 10;

export function normalizeProspectPool(resource: TeamtailorResource): ProspectPool {
  const { attributes } = resource;
  return {
    id: resource.id,
    name: getString(attributes, "name"),
    description: getString(attributes, "description"),
    color: getString(attributes, "color"),
    candidateCount: getNumber(attributes, "candidate-count") ?? 0,
    createdAt: getString(attributes, "created-at"),
    updatedAt: getString(attributes, "updated-at"),
  };
}

export function normalizePoolCandidate(resource: TeamtailorResource): PoolCandidate {
  const { attributes } = resource;
  return {
    id: resource.id,
    firstName: getString(attributes, "first-name"),
    lastName: getString(attributes, "last-name"),
    email: getString(attributes, "email"),
    phone: getString(attributes, "phone"),
    linkedinUrl: getString(attributes, "linkedin-url"),
    tags: candidateTagList(resource),
    createdAt: getString(attributes, "created-at"),
  };
}

function rethrowMissing(error: unknown, message: string): never {
  if (isHttpError(error, 404)) throw notFound(message);
  throw error;
}

export async function listProspectPools(
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<ProspectPoolList> {
  const pools = (await client.listProspectPools()).map(normalizeProspectPool);
  return { pools, total: pools.length };
}

export async function getProspectPool(
  poolId: string,
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<ProspectPool> {
  try {
    return normalizeProspectPool(await client.getProspectPool(poolId));
  } catch (error) {
    rethrowMissing(error, "Prospect pool not found");
  }
}

export async function createProspectPool(
  input: { name: string; description?: string; color?: string },
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<ProspectPool> {
  const pool = normalizeProspectPool(await client.createProspectPool({ ...input }));
  log.info("Prospect pool created", { poolId: pool.id, name: pool.name });
  return pool;
}

export async function updateProspectPool(
  poolId: string,
  input: { name?: string; description?: string; color?: string },
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<ProspectPool> {
  try {
    return normalizeProspectPool(await client.updateProspectPool(poolId, { ...input }));
  } catch (error) {
    rethrowMissing(error, "Prospect pool not found");
  }
}

export async function deleteProspectPool(
  poolId: string,
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<void> {
  try {
    await client.deleteProspectPool(poolId);
  } catch (error) {
    rethrowMissing(error, "Prospect pool not found");
  }
  log.info("Prospect pool deleted", { poolId });
}

export async function getPoolCandidates(
  poolId: string,
  query: { page: number; per_page: number },
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<PoolCandidatePage> {
  const document = await client.get("/candidates", {
    "filter[prospect-pool-id]": poolId,
    "page[number]": query.page,
    "page[size]": query.per_page,
  });
  const candidates = resourceList(document).map(normalizePoolCandidate);
  return {
    poolId,
    candidates,
    total: getNumber(document.meta, "record-count") ?? candidates.length,
    page: query.page,
    perPage: query.per_page,
  };
}

export async function addCandidateToPool(
  poolId: string,
  candidateId: string,
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<PoolMembership> {
  const membership = await client.addToProspectPool(poolId, candidateId);
  return { id: membership.id, poolId, candidateId };
}

export async function removeCandidateFromPool(
  poolId: string,
  candidateId: string,
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<void> {
  const membershipId = await client.findPoolMembershipId(poolId, candidateId);
  if (!membershipId) throw notFound("Candidate not found in prospect pool");
  await client.removePoolMembership(membershipId);
}

export async function addCandidatesToPool(
  poolId: string,
  candidateIds: string[],
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<BulkPoolResult> {
  const result: BulkPoolResult = { added: 0, failed: 0, errors: [] };
  for (const candidateId of candidateIds) {
    try {
      await client.addToProspectPool(poolId, candidateId);
      result.added++;
    } catch (error) {
      const message = describeError(error);
      log.warn("Adding candidate to prospect pool failed", {
        poolId,
        candidateId,
        error: message,
      });
      result.failed++;
      result.errors.push({ candidateId, error: message });
    }
  }
  return result;
}

export function summarizePool(
  pool: ProspectPool,
  candidates: PoolCandidate[],
): ProspectPoolStats {
  const total = candidates.length;
  const withEmail = candidates.filter((candidate) => candidate.email).length;
  const withPhone = candidates.filter((candidate) => candidate.phone).length;
  const withLinkedin = candidates.filter((candidate) => candidate.linkedinUrl).length;

  const counts = new Map<string, number>();
  for (const tag of candidates.flatMap((candidate) => candidate.tags)) {
    counts.set(tag, (counts.get(tag) ?? 0) + 1);
  }
  const topTags: TagCount[] = [...counts.entries()]
    .map(([tag, count]) => ({ tag, count }))
    .sort((a, b) => b.count - a.count || a.tag.localeCompare(b.tag))
    .slice(0, STATS_TOP_TAGS);

  return {
    poolId: pool.id,
    poolName: pool.name,
    totalCandidates: total,
    withEmail,
    withPhone,
    withLinkedin,
    emailCompletionRate: percentage(withEmail, total),
    phoneCompletionRate: percentage(withPhone, total),
    linkedinCompletionRate: percentage(withLinkedin, total),
    topTags,
  };
}

export async function getPoolStats(
  poolId: string,
  client: TeamtailorClient = getTeamtailorClient(),
): Promise<ProspectPoolStats> {
  const pool = await getProspectPool(poolId, client);
  const candidates = await client.listAll(
    "/candidates",
    { "filter[prospect-pool-id]": poolId },
    { maxItems: STATS_MAX_CANDIDATES },
  );
  return summarizePool(pool, candidates.map(normalizePoolCandidate));
}

async function findPoolByName(
  client: TeamtailorClient,
  name: string,
): Promise<TeamtailorResource | null> {
  const pools = await client.listProspectPools();
  return pools.find((pool) => getString(pool.attributes, "name") === name) ?? null;
}

/**
 * Resolves the candidate through the id mapping (creating it when absent)
 * and adds it to the pool unless it is already a member. A dry run only
 * reads.
 */
async function moveCandidate(
  client: TeamtailorClient,
  poolId: string | null,
  candidate: ExportCandidate,
  dryRun: boolean,
): Promise<"added" | "skipped"> {
  let candidateId = await idMappings.getMappedId("candidates", candidate.externalId);
  if (!candidateId && !dryRun) {
    const result = await client.upsert({
      type: "candidates",
      externalId: candidate.externalId,
      attributes: candidateAttributes(candidate),
    });
    candidateId = result.id;
    await idMappings.saveMapping("candidates", candidate.externalId, candidateId);
  }
  if (candidateId && poolId && (await client.findPoolMembershipId(poolId, candidateId))) {
    return "skipped";
  }
  if (dryRun || !poolId || !candidateId) return "added";
  await client.addToProspectPool(poolId, candidateId);
  return "added";
}

/**
 * Adds the exported candidates to the pool named `poolName`, creating the
 * pool first when none has that name. Writes `json/report_prospects.json`.
 */
export async function migrateProspects(
  input: ProspectMigrationInput,
  options: { client?: TeamtailorClient; document?: TeamtailorExport } = {},
): Promise<ProspectMigrationReport> {
  const document = options.document ?? (await requireTeamtailorExport());
  const client = options.client ?? getTeamtailorClient();
  const dryRun = input.dryRun ?? false;
  const candidates =
    input.limit === undefined
      ? document.candidates
      : document.candidates.slice(0, input.limit);

  const report: ProspectMigrationReport = {
    poolId: null,
    poolName: input.poolName,
    poolCreated: false,
    dryRun,
    processed: 0,
    added: 0,
    skipped: 0,
    failed: 0,
    errors: [],
  };

  let pool = await findPoolByName(client, input.poolName);
  if (!pool && !dryRun) {
    pool = await client.createProspectPool({
      name: input.poolName,
      description: `Migrated from Greenhouse - ${input.poolName}`,
    });
    report.poolCreated = true;
  }
  report.poolId = pool?.id ?? null;
  log.info("Prospect migration started", {
    poolName: input.poolName,
    poolId: report.poolId,
    candidates: candidates.length,
    dryRun,
  });

  for (const candidate of candidates) {
    report.processed++;
    try {
      report[await moveCandidate(client, report.poolId, candidate, dryRun)]++;
    } catch (error) {
      const message = describeError(error);
      log.warn("Prospect migration failed for candidate", {
        externalId: candidate.externalId,
        error: message,
      });
      report.failed++;
      report.errors.push({ externalId: candidate.externalId, error: message });
    }
  }

  await saveJson("report_prospects", report);
  log.info("Prospect migration finished", {
    poolId: report.poolId,
    added: report.added,
    skipped: report.skipped,
    failed: report.failed,
  });
  return report;
}
