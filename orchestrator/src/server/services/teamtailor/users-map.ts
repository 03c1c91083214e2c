import { logger } from "@infra/logger";
import { saveRecords } from "@server/services/storage";
import { requireTeamtailorExport } from "@server/services/transform";
import type { TeamtailorExport, UsersMapRow, UsersMapResult } from "@shared/types";
import { getString } from "@shared/utils/records";
import { getTeamtailorClient, type TeamtailorClient, type TeamtailorResource } from "./client";

const log = logger.child({ service: "users-map" });

function normalizeEmail(email: string | null): string | null {
  return email ? email.trim().toLowerCase() : null;
}

export function matchUsers(
  document: Pick<TeamtailorExport, "users">,
  teamtailorUsers: TeamtailorResource[],
): UsersMapRow[] {
  const byEmail = new Map<string, TeamtailorResource>();
  for (const user of teamtailorUsers) {
    const email = normalizeEmail(getString(user.attributes, "email"));
    if (email && !byEmail.has(email)) byEmail.set(email, user);
  }

  return document.users.map((user) => {
    const email = normalizeEmail(user.email);
    const match = email ? byEmail.get(email) : undefined;
    return {
      ghExternalId: user.externalId,
      ghName: user.name,
      ghEmail: user.email,
      ttUserId: match?.id ?? null,
      ttName: match ? getString(match.attributes, "name") : null,
      ttEmail: match ? getString(match.attributes, "email") : null,
      status: match ? "matched" : "missing_in_tt",
    };
  });
}

/** Matches exported users to Teamtailor users by email and saves the map. */
export async function buildUsersMap(
  options: { client?: TeamtailorClient; document?: TeamtailorExport } = {},
): Promise<UsersMapResult> {
  const document = options.document ?? (await requireTeamtailorExport());
  const client = options.client ?? getTeamtailorClient();

  const rows = matchUsers(document, await client.listAll("/users"));
  const files = await saveRecords(
    "users_map",
    rows.map((row) => ({ ...row })),
  );
  const matched = rows.filter((row) => row.status === "matched").length;
  const totals = { total: rows.length, matched, missing: rows.length - matched };
  log.info("Users map written", totals);
  return { rows, totals, files };
}
