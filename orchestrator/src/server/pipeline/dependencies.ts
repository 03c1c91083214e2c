/**
 * Entity dependency graph for the Teamtailor import.
 *
 * An entity may only be imported once everything it references exists in
 * Teamtailor: jobs and candidates before applications, applications before
 * the comments and custom-field values attached to them.
 */

import { badRequest } from "@infra/errors";
import { MIGRATION_ENTITIES, type MigrationEntity } from "@shared/types";

export const ENTITY_DEPENDENCIES: Record<MigrationEntity, readonly MigrationEntity[]> = {
  users: [],
  jobs: ["users"],
  candidates: ["jobs"],
  applications: ["candidates", "jobs"],
  notes: ["applications"],
  interviews: ["applications"],
  offers: ["applications"],
  custom_field_values: ["offers"],
};

export type DependencyGraph = Record<string, readonly string[]>;

export class DependencyCycleError extends Error {
  constructor(readonly entities: string[]) {
    super(`Dependency cycle between: ${entities.join(", ")}`);
    this.name = "DependencyCycleError";
  }
}

/**
 * Kahn's algorithm over the nodes of `graph`. Ready nodes are taken in the
 * order the graph declares them, so the result is stable.
 */
export function topologicalSort(graph: DependencyGraph): string[] {
  const nodes = Object.keys(graph);
  const inDegree = new Map<string, number>(nodes.map((node) => [node, 0]));
  const dependents = new Map<string, string[]>(nodes.map((node) => [node, []]));

  for (const node of nodes) {
    for (const dependency of graph[node]) {
      if (!inDegree.has(dependency)) {
        throw new Error(`${node} depends on unknown entity ${dependency}`);
      }
      inDegree.set(node, (inDegree.get(node) ?? 0) + 1);
      dependents.get(dependency)?.push(node);
    }
  }

  const order: string[] = [];
  const done = new Set<string>();
  while (order.length < nodes.length) {
    const next = nodes.find((node) => !done.has(node) && inDegree.get(node) === 0);
    if (next === undefined) {
      throw new DependencyCycleError(nodes.filter((node) => !done.has(node)));
    }
    order.push(next);
    done.add(next);
    for (const dependent of dependents.get(next) ?? []) {
      inDegree.set(dependent, (inDegree.get(dependent) ?? 0) - 1);
    }
  }
  return order;
}

function isMigrationEntity(value: string): value is MigrationEntity {
  return MIGRATION_ENTITIES.some((entity) => entity === value);
}

function withDependencies(entities: Iterable<MigrationEntity>): Set<MigrationEntity> {
  const result = new Set<MigrationEntity>();
  const visit = (entity: MigrationEntity) => {
    if (result.has(entity)) return;
    result.add(entity);
    for (const dependency of ENTITY_DEPENDENCIES[entity]) visit(dependency);
  };
  for (const entity of entities) visit(entity);
  return result;
}

/**
 * Orders the requested entities for import. Unknown names are rejected.
 * With `includeDependencies` every transitive prerequisite is added.
 */
export function resolveMigrationOrder(
  requested: readonly string[] = MIGRATION_ENTITIES,
  options: { includeDependencies?: boolean } = {},
): MigrationEntity[] {
  const unknown = requested.filter((entity) => !isMigrationEntity(entity));
  if (unknown.length > 0) {
    throw badRequest(`Unknown migration entities: ${unknown.join(", ")}`, {
      unknown,
      allowed: MIGRATION_ENTITIES,
    });
  }

  const selected = new Set(requested.filter(isMigrationEntity));
  const included = options.includeDependencies ? withDependencies(selected) : selected;
  return topologicalSort(ENTITY_DEPENDENCIES)
    .filter(isMigrationEntity)
    .filter((entity) => included.has(entity));
}
