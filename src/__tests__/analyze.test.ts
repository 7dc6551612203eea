/**
 * Tests for the persistent issue analysis pipeline
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { analyze } from '../features/analysis/analyze.js';
import { serializeAnalysisResult } from '../features/analysis/serialize.js';
import { ConfigurationError } from '../core/rounds/errors.js';
import type { SnapshotLoadResult } from '../core/rounds/types.js';
import { createTempWorkspace, incidentsIn, snapshotWith, SNAPSHOT_FILE } from './helpers/workspace.js';
import type { TempWorkspace } from './helpers/workspace.js';

const R1 = 'round_20240101_120000';
const R2 = 'round_20240102_120000';
const R3 = 'round_20240103_120000';
const R4 = 'round_20240104_120000';

describe('analyze', () => {
  let workspace: TempWorkspace;

  afterEach(() => {
    workspace.cleanup();
  });

  function threeRounds(): void {
    workspace.addRound(R1, snapshotWith({
      'rule-a': { category: 'mandatory', effort: 3, incidents: incidentsIn('/src/A.java', '/src/A.java') },
      'rule-b': { category: 'optional', effort: 1, incidents: incidentsIn('/src/B.java') },
    }));
    workspace.addRound(R2, snapshotWith({
      'rule-a': { category: 'mandatory', effort: 3, incidents: incidentsIn('/src/A.java', '/src/A.java') },
    }));
    workspace.addRound(R3, snapshotWith({
      'rule-a': {
        category: 'mandatory',
        effort: 3,
        incidents: incidentsIn('/src/A.java', '/src/B.java', '/src/C.java', '/src/C.java', '/src/D.java'),
      },
      'rule-b': { category: 'optional', effort: 1, incidents: incidentsIn('/src/B.java') },
    }));
  }

  it('should find issues that persist across every round', async () => {
    workspace = createTempWorkspace();
    threeRounds();

    const result = await analyze(workspace.root);

    expect(result.roundsFound).toBe(3);
    expect(result.rounds.map((r) => [r.name, r.uniqueIssues, r.totalIncidents])).toEqual([
      [R1, 2, 3],
      [R2, 1, 2],
      [R3, 2, 6],
    ]);
    expect(result.outcome.kind).toBe('classified');
    if (result.outcome.kind !== 'classified') return;

    const { persistentIssues, recommendations } = result.outcome;
    expect([...persistentIssues.keys()]).toEqual(['rule-a']);
    const ruleA = persistentIssues.get('rule-a');
    expect(ruleA?.trend).toBe('worsening');
    expect(ruleA?.firstIncidentCount).toBe(2);
    expect(ruleA?.lastIncidentCount).toBe(5);
    expect(ruleA?.latest.filesAffected).toEqual(['/src/A.java', '/src/B.java', '/src/C.java', '/src/D.java']);

    expect(recommendations.highImpact).toEqual(['rule-a']);
    expect([...recommendations.byCategory.entries()]).toEqual([['mandatory', ['rule-a']]]);
    expect([...recommendations.byEffort.entries()]).toEqual([['3', ['rule-a']]]);
  });

  it('should honour a lower persistence threshold', async () => {
    workspace = createTempWorkspace();
    threeRounds();

    const result = await analyze(workspace.root, { minRounds: 2 });

    if (result.outcome.kind !== 'classified') throw new Error('expected classified');
    expect([...result.outcome.persistentIssues.keys()]).toEqual(['rule-a', 'rule-b']);
    expect(result.outcome.persistentIssues.get('rule-b')?.persistence).toBe(2);
  });

  it('should skip a round whose snapshot is missing and report it', async () => {
    workspace = createTempWorkspace();
    threeRounds();
    workspace.addRound(R4);

    const result = await analyze(workspace.root);

    expect(result.roundsFound).toBe(4);
    expect(result.rounds).toHaveLength(3);
    expect(result.skippedRounds).toHaveLength(1);
    expect(result.skippedRounds[0]?.name).toBe(R4);
    expect(result.skippedRounds[0]?.reason).toMatch(/^missing: /);
    expect(result.warnings).toContainEqual(expect.objectContaining({
      kind: 'snapshot_load_failed',
      source: join(workspace.root, R4, SNAPSHOT_FILE),
    }));
  });

  it('should report insufficient data when too few rounds load', async () => {
    workspace = createTempWorkspace();
    workspace.addRound(R1, snapshotWith({ 'rule-a': { incidents: incidentsIn('/a') } }));
    workspace.addRound(R2, snapshotWith({ 'rule-a': { incidents: incidentsIn('/a') } }));
    workspace.addRawRound(R3, 'key: [unclosed');

    const result = await analyze(workspace.root);

    expect(result.outcome).toEqual({ kind: 'insufficient_data', required: 3, available: 2 });
  });

  it('should return insufficient data for an empty or missing workspace', async () => {
    workspace = createTempWorkspace();

    const missing = await analyze(join(workspace.root, 'does-not-exist'));
    expect(missing.roundsFound).toBe(0);
    expect(missing.outcome).toEqual({ kind: 'insufficient_data', required: 3, available: 0 });
    expect(missing.warnings).toEqual([]);
  });

  it('should collect locator warnings before per-round warnings', async () => {
    workspace = createTempWorkspace();
    workspace.addRound('round_20241301_000000');
    workspace.addRound(R1, [{ name: 'rs', violations: { bad: { incidents: 'nope' } } }]);

    const result = await analyze(workspace.root, { minRounds: 1 });

    expect(result.warnings.map((w) => w.kind)).toEqual(['directory_skipped', 'shape_mismatch']);
  });

  it('should serialize identically across runs over an unchanged workspace', async () => {
    workspace = createTempWorkspace();
    threeRounds();
    workspace.addRound(R4);

    const first = serializeAnalysisResult(await analyze(workspace.root));
    const second = serializeAnalysisResult(await analyze(workspace.root));

    expect(second).toBe(first);
    expect(JSON.parse(first)).toMatchObject({
      roundsFound: 4,
      rounds: [{ name: R1, timestamp: '2024-01-01T12:00:00.000Z' }, { name: R2 }, { name: R3 }],
    });
  });

  it('should give the same result whatever the concurrency', async () => {
    workspace = createTempWorkspace();
    threeRounds();

    const serial = serializeAnalysisResult(await analyze(workspace.root, { concurrency: 1 }));
    const parallel = serializeAnalysisResult(await analyze(workspace.root, { concurrency: 8 }));

    expect(parallel).toBe(serial);
  });

  it('should fold rounds in order even when loads complete out of order', async () => {
    workspace = createTempWorkspace();
    for (const name of [R1, R2, R3]) workspace.addRound(name);

    const counts: Record<string, number> = { [R1]: 1, [R2]: 2, [R3]: 3 };
    const delays: Record<string, number> = { [R1]: 30, [R2]: 15, [R3]: 0 };
    const loader = async (path: string): Promise<SnapshotLoadResult> => {
      const round = [R1, R2, R3].find((name) => path.includes(name)) ?? R1;
      await new Promise((resolve) => setTimeout(resolve, delays[round]));
      const incidents = Array.from({ length: counts[round] ?? 0 }, (_, i) => ({ uri: `file:///f${i}`, message: 'm' }));
      return { ok: true, document: [{ name: 'rs', violations: { 'rule-a': { incidents } } }] };
    };

    const result = await analyze(workspace.root, { loader, concurrency: 3 });

    if (result.outcome.kind !== 'classified') throw new Error('expected classified');
    const timeline = result.outcome.persistentIssues.get('rule-a')?.timeline;
    expect(timeline?.entries.map((e) => e.record.incidentCount)).toEqual([1, 2, 3]);
    expect(result.outcome.persistentIssues.get('rule-a')?.trend).toBe('worsening');
  });

  it('should read the configured snapshot file name', async () => {
    workspace = createTempWorkspace();
    workspace.addRound(R1);
    const loader = vi.fn(async (): Promise<SnapshotLoadResult> => ({ ok: true, document: [] }));

    await analyze(workspace.root, { loader, snapshotFile: 'report.yaml', minRounds: 1 });

    expect(loader).toHaveBeenCalledWith(join(workspace.root, R1, 'report.yaml'));
  });

  it('should reject invalid options before touching the workspace', async () => {
    workspace = createTempWorkspace();
    workspace.addRound(R1);
    const loader = vi.fn(async (): Promise<SnapshotLoadResult> => ({ ok: true, document: [] }));

    await expect(analyze(workspace.root, { minRounds: 0, loader })).rejects.toThrow(ConfigurationError);
    await expect(analyze(workspace.root, { concurrency: 0, loader })).rejects.toThrow(ConfigurationError);
    await expect(analyze(workspace.root, { thresholds: { minFiles: -1 }, loader })).rejects.toThrow(ConfigurationError);
    await expect(analyze(workspace.root, { snapshotFile: ' ', loader })).rejects.toThrow(ConfigurationError);
    expect(loader).not.toHaveBeenCalled();
  });
});
