import { logger } from "@infra/logger";
import type {
  MigrationEntity,
  MigrationLogStatus,
  MigrationProgress,
} from "@shared/types";

/**
 * Migration progress tracking with Server-Sent Events.
 */

type ProgressListener = (progress: MigrationProgress) => void;
const listeners: Set<ProgressListener> = new Set();

function idleProgress(): MigrationProgress {
  return {
    step: "idle",
    message: "Ready",
    entitiesTotal: 0,
    entitiesDone: 0,
    recordsProcessed: 0,
    recordsTotal: 0,
    created: 0,
    updated: 0,
    skipped: 0,
    failed: 0,
  };
}

let currentProgress: MigrationProgress = idleProgress();

/**
 * Update the current progress and notify all listeners.
 */
export function updateProgress(update: Partial<MigrationProgress>): void {
  currentProgress = { ...currentProgress, ...update };

  for (const listener of listeners) {
    try {
      listener(currentProgress);
    } catch (error) {
      logger.error("Error in progress listener", error);
    }
  }
}

export function getProgress(): MigrationProgress {
  return { ...currentProgress };
}

/**
 * Subscribe to progress updates. The current state is sent immediately.
 */
export function subscribeToProgress(listener: ProgressListener): () => void {
  listeners.add(listener);
  listener(currentProgress);
  return () => {
    listeners.delete(listener);
  };
}

export function resetProgress(): void {
  currentProgress = idleProgress();
}

export const progressHelpers = {
  start: (runId: string, entitiesTotal: number) =>
    updateProgress({
      ...idleProgress(),
      step: "importing",
      message: "Starting migration...",
      runId,
      entitiesTotal,
      startedAt: new Date().toISOString(),
    }),

  exporting: (entity?: string) =>
    updateProgress({
      step: "exporting",
      message: entity
        ? `Exported ${entity} from Greenhouse`
        : "Exporting from Greenhouse...",
    }),

  transforming: () =>
    updateProgress({
      step: "transforming",
      message: "Building Teamtailor export...",
    }),

  entityStarted: (entity: MigrationEntity, recordsTotal: number) =>
    updateProgress({
      step: "importing",
      message: `Importing ${entity}...`,
      currentEntity: entity,
      recordsProcessed: 0,
      recordsTotal,
    }),

  recordDone: (status: MigrationLogStatus) => {
    const next = getProgress();
    next.recordsProcessed += 1;
    next[status] += 1;
    updateProgress(next);
  },

  entityDone: (entity: MigrationEntity) => {
    const current = getProgress();
    updateProgress({
      entitiesDone: current.entitiesDone + 1,
      message: `Imported ${entity} (${current.entitiesDone + 1}/${current.entitiesTotal})`,
    });
  },

  complete: () => {
    const current = getProgress();
    updateProgress({
      step: "completed",
      message: `Migration complete: ${current.created} created, ${current.updated} updated, ${current.skipped} skipped, ${current.failed} failed`,
      currentEntity: undefined,
      completedAt: new Date().toISOString(),
    });
  },

  cancelled: () =>
    updateProgress({
      step: "cancelled",
      message: "Migration cancelled",
      currentEntity: undefined,
      completedAt: new Date().toISOString(),
    }),

  failed: (error: string) =>
    updateProgress({
      step: "failed",
      message: "Migration failed",
      error,
      completedAt: new Date().toISOString(),
    }),
};
