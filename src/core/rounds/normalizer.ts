/**
 * Turns one loaded snapshot into an IssueSet.
 *
 * Each record type (ruleset, violation, incident) is validated on its own.
 * An entry that fails validation is skipped with a warning; its siblings
 * are still normalized. Incident fields are the exception: a wrongly typed
 * field is nulled and the incident still counts.
 */

import { z } from 'zod/v4';
import type {
  AnalysisWarning,
  Effort,
  IssueRecord,
  NormalizedSnapshot,
  Occurrence,
  SnapshotDocument,
  SnapshotLoadResult,
} from './types.js';
import { formatSchemaIssues } from '../../shared/utils/validation.js';

const FILE_URI_PREFIX = 'file://';

const RulesetSchema = z.object({
  name: z.string().nullish(),
  violations: z.record(z.string(), z.unknown()).nullish(),
});

const ViolationSchema = z.object({
  description: z.string().nullish(),
  category: z.string().nullish(),
  effort: z.union([z.number(), z.string()]).nullish(),
  incidents: z.array(z.unknown()).nullish(),
});

const IncidentSchema = z.record(z.string(), z.unknown());

const IncidentFieldSchemas = {
  uri: z.string(),
  message: z.string(),
  lineNumber: z.number().int(),
  codeSnip: z.string(),
};

type Validated<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly message: string };

function validate<S extends z.ZodType>(schema: S, raw: unknown): Validated<z.output<S>> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  return { ok: false, message: formatSchemaIssues(parsed.error.issues) };
}

function shapeWarning(source: string, what: string, message: string): AnalysisWarning {
  return {
    kind: 'shape_mismatch',
    source,
    message: `${what} does not match the expected shape (${message})`,
  };
}

/** Path from a `file://` URI; null for any other location */
export function fileFromUri(uri: string | null | undefined): string | null {
  if (typeof uri !== 'string' || !uri.startsWith(FILE_URI_PREFIX)) {
    return null;
  }
  const path = uri.slice(FILE_URI_PREFIX.length);
  return path.length > 0 ? path : null;
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

function readIncidentField<S extends z.ZodType>(
  incident: Readonly<Record<string, unknown>>,
  field: string,
  schema: S,
  location: string,
  warnings: AnalysisWarning[],
): z.output<S> | null {
  const raw = incident[field];
  if (raw === undefined || raw === null) return null;
  const parsed = validate(schema, raw);
  if (!parsed.ok) {
    warnings.push(shapeWarning(`${location}.${field}`, `incident field "${field}"`, parsed.message));
    return null;
  }
  return parsed.value;
}

function normalizeIncidents(
  incidents: readonly unknown[],
  location: string,
  warnings: AnalysisWarning[],
): Occurrence[] {
  const occurrences: Occurrence[] = [];
  incidents.forEach((raw, index) => {
    const incidentLocation = `${location} > incidents[${index}]`;
    const incident = validate(IncidentSchema, raw);
    if (!incident.ok) {
      warnings.push(shapeWarning(incidentLocation, 'incident', incident.message));
      return;
    }

    const fields = incident.value;
    occurrences.push({
      file: fileFromUri(readIncidentField(fields, 'uri', IncidentFieldSchemas.uri, incidentLocation, warnings)),
      lineNumber: readIncidentField(fields, 'lineNumber', IncidentFieldSchemas.lineNumber, incidentLocation, warnings),
      message: readIncidentField(fields, 'message', IncidentFieldSchemas.message, incidentLocation, warnings),
      codeSnippet: readIncidentField(fields, 'codeSnip', IncidentFieldSchemas.codeSnip, incidentLocation, warnings),
    });
  });
  return occurrences;
}

function normalizeViolation(
  ruleId: string,
  raw: unknown,
  rulesetName: string,
  location: string,
  warnings: AnalysisWarning[],
): IssueRecord | null {
  const violation = validate(ViolationSchema, raw);
  if (!violation.ok) {
    warnings.push(shapeWarning(location, `violation "${ruleId}"`, violation.message));
    return null;
  }

  const { description, category, effort, incidents } = violation.value;
  const occurrences = normalizeIncidents(incidents ?? [], location, warnings);
  const effortValue: Effort = effort ?? 'unknown';

  return {
    id: ruleId,
    description: description ?? 'No description',
    category: category ?? 'unknown',
    effort: effortValue,
    rulesetName,
    incidentCount: occurrences.length,
    filesAffected: unique(occurrences.flatMap((o) => (o.file === null ? [] : [o.file]))),
    messages: unique(occurrences.flatMap((o) => (o.message ? [o.message] : []))),
    occurrences,
  };
}

/**
 * Normalize a loaded snapshot document.
 *
 * @param document Loaded document, or null when the snapshot did not load
 * @param source Label used in warnings (normally the snapshot path)
 */
export function normalizeSnapshot(document: SnapshotDocument | null, source: string): NormalizedSnapshot {
  if (document === null) {
    return { totalIncidents: null, issues: new Map(), warnings: [] };
  }

  const warnings: AnalysisWarning[] = [];
  const issues = new Map<string, IssueRecord>();
  // Counts every violation, including records later replaced by a duplicate id.
  let totalIncidents = 0;

  document.forEach((rawRuleset, index) => {
    const rulesetLocation = `${source} > rulesets[${index}]`;
    const ruleset = validate(RulesetSchema, rawRuleset);
    if (!ruleset.ok) {
      warnings.push(shapeWarning(rulesetLocation, 'ruleset', ruleset.message));
      return;
    }

    const { violations } = ruleset.value;
    if (!violations) return;

    const rulesetName = ruleset.value.name ?? 'Unknown';
    for (const [ruleId, rawViolation] of Object.entries(violations)) {
      const location = `${rulesetLocation} > violations.${ruleId}`;
      const record = normalizeViolation(ruleId, rawViolation, rulesetName, location, warnings);
      if (!record) continue;
      totalIncidents += record.incidentCount;

      const previous = issues.get(ruleId);
      if (previous) {
        warnings.push({
          kind: 'duplicate_issue',
          source: location,
          message: `issue "${ruleId}" already reported by ruleset "${previous.rulesetName}"; keeping the later record`,
        });
      }
      issues.set(ruleId, record);
    }
  });

  return { totalIncidents, issues, warnings };
}

/**
 * Normalize the outcome of a snapshot load.
 * A failed load becomes a null result plus one warning.
 */
export function normalizeLoadResult(result: SnapshotLoadResult, source: string): NormalizedSnapshot {
  if (!result.ok) {
    return {
      totalIncidents: null,
      issues: new Map(),
      warnings: [{
        kind: 'snapshot_load_failed',
        source: result.error.path,
        message: `${result.error.kind}: ${result.error.message}`,
      }],
    };
  }
  return normalizeSnapshot(result.document, source);
}
