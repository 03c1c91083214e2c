export { ENTITY_DEPENDENCIES, resolveMigrationOrder } from "./dependencies";
export {
  getMigrationStatus,
  type MigrationResult,
  prepareMigration,
  requestMigrationCancel,
  type RunMigrationOptions,
  runMigration,
} from "./orchestrator";
export { getProgress, subscribeToProgress } from "./progress";
