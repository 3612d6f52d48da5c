/**
 * Configuration commit: the one path by which the console mutates configuration.
 *
 * Reads the latest file, optionally backs it up, applies the changes, rebuilds
 * the feed routing expression, saves, and regenerates the dashboard artifact.
 */

import type { ArtifactResult, DashboardArtifactGenerator } from '../artifacts/dashboard-artifact';
import type { ServiceCatalog } from '../config/service-catalog';
import type { BackupRecord, ConfigurationStore } from './configuration-store';
import { emptySnapshot, snapshotValues, upsert, type ConfigSnapshot } from './env-file';
import { buildFeedRouting } from './feed-routing';

export interface CommitDependencies {
  store: ConfigurationStore;
  artifacts: DashboardArtifactGenerator;
  catalog: ServiceCatalog;
}

export interface CommitResult {
  snapshot: ConfigSnapshot;
  artifact: ArtifactResult;
  backup?: BackupRecord;
}

/**
 * Snapshot with the routing expression recomputed from its current credentials
 */
export function withFeedRouting(snapshot: ConfigSnapshot, catalog: ServiceCatalog): ConfigSnapshot {
  const routing = buildFeedRouting(catalog.feedRouting, snapshotValues(snapshot));
  return upsert(snapshot, { [catalog.feedRouting.key]: routing });
}

export function persistConfiguration(
  deps: CommitDependencies,
  changes: Readonly<Record<string, string>>,
  options: { destructiveReason?: string } = {}
): CommitResult {
  const current = deps.store.load();
  const backup =
    current && options.destructiveReason !== undefined
      ? deps.store.backup(current, options.destructiveReason)
      : undefined;

  const snapshot = withFeedRouting(deps.store.upsert(current ?? emptySnapshot(), changes), deps.catalog);
  deps.store.save(snapshot);
  const artifact = deps.artifacts.regenerate(snapshot);
  return { snapshot, artifact, backup };
}

/**
 * Regenerate the artifact from the file as it is on disk (repair)
 */
export function regenerateFromStore(deps: Pick<CommitDependencies, 'store' | 'artifacts'>): ArtifactResult | undefined {
  const snapshot = deps.store.load();
  return snapshot ? deps.artifacts.regenerate(snapshot) : undefined;
}
