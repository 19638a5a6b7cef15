/**
 * Operational health snapshot
 */

import type { AnomalySink, BarStore } from '@barwatch/bar-store';
import type { Universe } from '@barwatch/ingestion';

export interface HealthReport {
  status: 'ok' | 'degraded';
  checkedAt: number;
  storedRowCount: number;
  /** Age of the oldest stored bar in ms, null when empty */
  oldestBarAge: number | null;
  activeUniverseSize: number;
  lastScoringPassTime: number | null;
  lastRetentionSweepTime: number | null;
  anomalyRowCount: number;
  estimatedStorageBytes: number;
  degradedInstruments: string[];
  /** Consecutive sweeps with a failing step */
  retentionFailures: number;
}

/**
 * What the report reads. Only storage is required, so one-shot commands can
 * report without running ingestion.
 */
export interface HealthSources {
  storage: { bars: Pick<BarStore, 'stats'>; anomalies: Pick<AnomalySink, 'stats'> };
  ingestion?: { universe: Pick<Universe, 'size'>; stats(): { degradedInstruments: string[] } | null };
  detection?: { lastPassTime: number | null };
  retention?: { lastSweepTime: number | null; consecutiveFailures: number };
  now?: number;
}

export async function buildHealthReport(sources: HealthSources): Promise<HealthReport> {
  const checkedAt = sources.now ?? Date.now();
  const [bars, anomalies] = await Promise.all([sources.storage.bars.stats(), sources.storage.anomalies.stats()]);

  const degradedInstruments = sources.ingestion?.stats()?.degradedInstruments ?? [];
  const retentionFailures = sources.retention?.consecutiveFailures ?? 0;
  const universeEmpty = sources.ingestion !== undefined && sources.ingestion.universe.size === 0;

  return {
    status: degradedInstruments.length > 0 || retentionFailures > 0 || universeEmpty ? 'degraded' : 'ok',
    checkedAt,
    storedRowCount: bars.rowCount,
    oldestBarAge: bars.oldestOpenTime === null ? null : Math.max(0, checkedAt - bars.oldestOpenTime),
    activeUniverseSize: sources.ingestion?.universe.size ?? 0,
    lastScoringPassTime: sources.detection?.lastPassTime ?? null,
    lastRetentionSweepTime: sources.retention?.lastSweepTime ?? null,
    anomalyRowCount: anomalies.rowCount,
    estimatedStorageBytes: bars.estimatedBytes,
    degradedInstruments,
    retentionFailures,
  };
}
