/**
 * Migration module exports
 */

export { type MigrationOptions, type MigrationSessions, runMigration } from "./orchestrator";
