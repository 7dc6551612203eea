/**
 * Unit tests for the snapshot normalizer
 */

import { describe, it, expect } from 'vitest';
import { fileFromUri, normalizeLoadResult, normalizeSnapshot } from '../core/rounds/normalizer.js';

const SOURCE = 'round_20240101_120000/kantra_output.yaml';

describe('fileFromUri', () => {
  it('should strip the file scheme', () => {
    expect(fileFromUri('file:///src/App.java')).toBe('/src/App.java');
  });

  it('should ignore other schemes and empty paths', () => {
    expect(fileFromUri('https://example.com/App.java')).toBeNull();
    expect(fileFromUri('file://')).toBeNull();
    expect(fileFromUri(undefined)).toBeNull();
  });
});

describe('normalizeSnapshot', () => {
  it('should count every incident and deduplicate affected files', () => {
    const document = [{
      name: 'eap8',
      violations: {
        'javax-to-jakarta': {
          description: 'Replace javax with jakarta',
          category: 'mandatory',
          effort: 1,
          incidents: [
            { uri: 'file:///src/A.java', message: 'Replace javax.inject', lineNumber: 3 },
            { uri: 'file:///src/A.java', message: 'Replace javax.inject', lineNumber: 9 },
            { uri: 'file:///src/B.java', message: 'Replace javax.ejb' },
          ],
        },
      },
    }];

    const { totalIncidents, issues, warnings } = normalizeSnapshot(document, SOURCE);

    expect(totalIncidents).toBe(3);
    expect(warnings).toEqual([]);
    const record = issues.get('javax-to-jakarta');
    expect(record?.incidentCount).toBe(3);
    expect(record?.filesAffected).toEqual(['/src/A.java', '/src/B.java']);
    expect(record?.messages).toEqual(['Replace javax.inject', 'Replace javax.ejb']);
    expect(record?.rulesetName).toBe('eap8');
    expect(record?.category).toBe('mandatory');
    expect(record?.effort).toBe(1);
    expect(record?.occurrences[1]).toEqual({
      file: '/src/A.java',
      lineNumber: 9,
      message: 'Replace javax.inject',
      codeSnippet: null,
    });
  });

  it('should fill defaults for missing fields', () => {
    const { issues } = normalizeSnapshot([{ violations: { 'rule-x': {} } }], SOURCE);

    expect(issues.get('rule-x')).toEqual({
      id: 'rule-x',
      description: 'No description',
      category: 'unknown',
      effort: 'unknown',
      rulesetName: 'Unknown',
      incidentCount: 0,
      filesAffected: [],
      messages: [],
      occurrences: [],
    });
  });

  it('should count incidents with non-file locations without adding files', () => {
    const document = [{
      name: 'r',
      violations: {
        'rule-1': { incidents: [{ uri: 'jar:lib.jar!/X.class', message: 'm' }, { message: 'no uri' }] },
      },
    }];

    const { issues } = normalizeSnapshot(document, SOURCE);

    expect(issues.get('rule-1')?.incidentCount).toBe(2);
    expect(issues.get('rule-1')?.filesAffected).toEqual([]);
  });

  it('should skip rulesets without violations silently', () => {
    const { totalIncidents, issues, warnings } = normalizeSnapshot(
      [{ name: 'empty', violations: null }, { name: 'also-empty' }],
      SOURCE,
    );

    expect(totalIncidents).toBe(0);
    expect(issues.size).toBe(0);
    expect(warnings).toEqual([]);
  });

  it('should skip a malformed ruleset and keep its siblings', () => {
    const document = [
      'not-a-ruleset',
      { name: 'ok', violations: { 'rule-1': { incidents: [{ uri: 'file:///a' }] } } },
    ];

    const { issues, warnings } = normalizeSnapshot(document, SOURCE);

    expect([...issues.keys()]).toEqual(['rule-1']);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.kind).toBe('shape_mismatch');
    expect(warnings[0]?.source).toBe(`${SOURCE} > rulesets[0]`);
  });

  it('should skip a malformed violation and keep its siblings', () => {
    const document = [{
      name: 'r',
      violations: {
        'bad-rule': { incidents: 'not-a-list' },
        'good-rule': { incidents: [{ uri: 'file:///a' }] },
      },
    }];

    const { totalIncidents, issues, warnings } = normalizeSnapshot(document, SOURCE);

    expect([...issues.keys()]).toEqual(['good-rule']);
    expect(totalIncidents).toBe(1);
    expect(warnings.map((w) => w.source)).toEqual([`${SOURCE} > rulesets[0] > violations.bad-rule`]);
  });

  it('should skip an incident that is not a mapping and keep the rest of the record', () => {
    const document = [{
      name: 'r',
      violations: {
        'rule-1': { incidents: [{ uri: 'file:///a' }, 42, 'file:///b', { uri: 'file:///c' }] },
      },
    }];

    const { issues, warnings } = normalizeSnapshot(document, SOURCE);

    expect(issues.get('rule-1')?.incidentCount).toBe(2);
    expect(issues.get('rule-1')?.filesAffected).toEqual(['/a', '/c']);
    expect(warnings.map((w) => w.source)).toEqual([
      `${SOURCE} > rulesets[0] > violations.rule-1 > incidents[1]`,
      `${SOURCE} > rulesets[0] > violations.rule-1 > incidents[2]`,
    ]);
  });

  it('should still count an incident whose fields have the wrong type', () => {
    const document = [{
      name: 'r',
      violations: {
        'rule-1': {
          incidents: [
            { uri: 42, message: 'm1' },
            { uri: 'file:///x', lineNumber: '12', codeSnip: ['not', 'text'] },
            { uri: 'file:///y' },
          ],
        },
      },
    }];

    const { totalIncidents, issues, warnings } = normalizeSnapshot(document, SOURCE);
    const record = issues.get('rule-1');

    expect(totalIncidents).toBe(3);
    expect(record?.incidentCount).toBe(3);
    expect(record?.filesAffected).toEqual(['/x', '/y']);
    expect(record?.messages).toEqual(['m1']);
    expect(record?.occurrences[0]).toEqual({ file: null, lineNumber: null, message: 'm1', codeSnippet: null });
    expect(record?.occurrences[1]).toEqual({ file: '/x', lineNumber: null, message: null, codeSnippet: null });
    expect(warnings.map((w) => [w.kind, w.source])).toEqual([
      ['shape_mismatch', `${SOURCE} > rulesets[0] > violations.rule-1 > incidents[0].uri`],
      ['shape_mismatch', `${SOURCE} > rulesets[0] > violations.rule-1 > incidents[1].lineNumber`],
      ['shape_mismatch', `${SOURCE} > rulesets[0] > violations.rule-1 > incidents[1].codeSnip`],
    ]);
  });

  it('should keep the later record when two rulesets report the same id', () => {
    const document = [
      { name: 'first', violations: { dup: { incidents: [{ uri: 'file:///a' }] } } },
      { name: 'second', violations: { dup: { incidents: [{ uri: 'file:///a' }, { uri: 'file:///b' }] } } },
    ];

    const { issues, warnings } = normalizeSnapshot(document, SOURCE);

    expect(issues.get('dup')?.rulesetName).toBe('second');
    expect(issues.get('dup')?.incidentCount).toBe(2);
    expect(warnings.map((w) => w.kind)).toEqual(['duplicate_issue']);
  });

  it('should count incidents of a replaced duplicate in the snapshot total', () => {
    const document = [
      { name: 'r1', violations: { a: { incidents: [{ uri: 'file:///a' }, { uri: 'file:///b' }] } } },
      { name: 'r2', violations: { a: { incidents: [{ uri: 'file:///c' }] } } },
    ];

    const { totalIncidents, issues } = normalizeSnapshot(document, SOURCE);

    expect(totalIncidents).toBe(3);
    expect(issues.size).toBe(1);
  });

  it('should distinguish an empty document from a missing one', () => {
    expect(normalizeSnapshot([], SOURCE).totalIncidents).toBe(0);
    expect(normalizeSnapshot(null, SOURCE).totalIncidents).toBeNull();
  });
});

describe('normalizeLoadResult', () => {
  it('should turn a load failure into a null result with one warning', () => {
    const normalized = normalizeLoadResult(
      { ok: false, error: { kind: 'syntax', path: SOURCE, message: 'bad indentation' } },
      SOURCE,
    );

    expect(normalized.totalIncidents).toBeNull();
    expect(normalized.issues.size).toBe(0);
    expect(normalized.warnings).toEqual([
      { kind: 'snapshot_load_failed', source: SOURCE, message: 'syntax: bad indentation' },
    ]);
  });
});
