// engine/runAssignmentPipeline.ts
//
// Validation-gated batch pipeline:
//
//   read → normalize → schema check (stop before any remote call)
//        → fetch inventory snapshot → validate every row
//        → any issue?  write validation report, assign nothing
//        → otherwise   assign each row, write results table
//
// ReadError / FetchError / SiteError propagate as the single terminal error.
// Row issues come back as data in the BLOCKED variant.

import type { ArtifactStore } from './artifactStore';
import { buildValidationReport } from './buildValidationReport';
import { REQUIRED_FIELD_LABELS } from './constants';
import { SiteError, errorMessage } from './errors';
import { noopEventSink, type ArtifactKind, type PipelineEventSink } from './events';
import { executeAssignments } from './executeAssignments';
import type { InventoryClient } from './inventoryClient';
import { normalizeTable } from './normalizeTable';
import { parseInputBuffer, readInputFile, type InputKind } from './readInput';
import type {
  AssignmentOutcome,
  AssignmentSummary,
  Issue,
  NormalizedTable,
  OutputFormat,
  RawTable,
  ResultTable
} from './types';
import { validateBatch } from './validateRows';
import { buildHeaderIssue, findMissingColumns } from './validateSchema';
import { writeTableArtifact } from './writeArtifact';

export type PipelineInput =
  | { path: string; kind?: InputKind }
  | { buffer: Buffer; file_name: string; kind?: InputKind };

export interface PipelineRequest {
  input: PipelineInput;
  site_id: string;
  /**
   * Look the site up in the org's site list once the file has passed the
   * schema check; an unknown id raises SiteError before any inventory fetch.
   */
  verify_site?: boolean;
  sheet_name?: string | null;
  /** Validate only; never assign. */
  dry_run?: boolean;
  concurrency?: number;
  output_format?: OutputFormat;
}

export interface PipelineDeps {
  client: InventoryClient;
  store: ArtifactStore;
  sink?: PipelineEventSink;
  now?: () => Date;
}

export type PipelineResult =
  | {
      status: 'BLOCKED';
      issues: Issue[];
      /** null when the report could not be persisted. */
      report_location: string | null;
      required_fields: string[];
    }
  | { status: 'VALIDATED'; site_name: string | null; row_count: number }
  | {
      status: 'COMPLETED';
      /** null unless `verify_site` was set. */
      site_name: string | null;
      table: ResultTable;
      outcomes: AssignmentOutcome[];
      summary: AssignmentSummary;
      /** null when the results file could not be persisted. */
      result_location: string | null;
    };

async function readRaw(request: PipelineRequest): Promise<{ raw: RawTable; label: string }> {
  const { input } = request;
  const sheetName = request.sheet_name ?? null;

  if ('path' in input) {
    const raw = await readInputFile(input.path, { kind: input.kind, sheetName });
    return { raw, label: input.path };
  }

  const raw = await parseInputBuffer(input.buffer, {
    kind: input.kind,
    fileName: input.file_name,
    sheetName
  });
  return { raw, label: input.file_name };
}

async function resolveSiteName(request: PipelineRequest, deps: PipelineDeps): Promise<string | null> {
  if (!request.verify_site) return null;
  const sites = await deps.client.fetchSites();
  const site = sites.find((s) => s.id === request.site_id);
  if (!site) throw new SiteError(request.site_id);
  return site.name;
}

async function persist(
  table: NormalizedTable,
  kind: ArtifactKind,
  request: PipelineRequest,
  deps: PipelineDeps,
  sink: PipelineEventSink
): Promise<string | null> {
  try {
    const location = await writeTableArtifact(table, deps.store, {
      kind,
      format: request.output_format ?? 'csv',
      now: deps.now?.()
    });
    sink.record({ type: 'artifact_written', kind, location });
    return location;
  } catch (err) {
    // The in-memory table is still returned to the caller.
    sink.record({ type: 'artifact_write_failed', kind, error: errorMessage(err) });
    return null;
  }
}

async function blocked(
  table: NormalizedTable,
  issues: Issue[],
  request: PipelineRequest,
  deps: PipelineDeps,
  sink: PipelineEventSink
): Promise<PipelineResult> {
  const report = buildValidationReport(table, issues);
  const reportLocation = await persist(report, 'validation_report', request, deps, sink);

  return {
    status: 'BLOCKED',
    issues,
    report_location: reportLocation,
    required_fields: [...REQUIRED_FIELD_LABELS]
  };
}

export async function runAssignmentPipeline(
  request: PipelineRequest,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const sink = deps.sink ?? noopEventSink;

  // 1) Read + normalize
  const { raw, label } = await readRaw(request);
  const table = normalizeTable(raw);
  sink.record({
    type: 'input_read',
    file: label,
    row_count: table.rows.length,
    column_count: table.columns.length
  });

  // 2) Schema gate: no remote call for a structurally wrong file
  const missing = findMissingColumns(table.columns);
  if (missing.length > 0) {
    sink.record({ type: 'schema_rejected', missing_columns: missing });
    const headerOnly: NormalizedTable = { columns: table.columns, rows: [] };
    return blocked(headerOnly, [buildHeaderIssue(missing)], request, deps, sink);
  }

  // 3) Site lookup, then inventory snapshot (both fatal on failure)
  const siteName = await resolveSiteName(request, deps);
  const snapshot = await deps.client.fetchInventory();
  sink.record({ type: 'inventory_fetched', serial_count: snapshot.size });

  // 4) All-or-none row validation
  const validation = validateBatch(table, snapshot);
  if (!validation.ok) {
    sink.record({
      type: 'validation_failed',
      issue_count: validation.issues.length,
      row_count: table.rows.length
    });
    return blocked(table, validation.issues, request, deps, sink);
  }
  sink.record({ type: 'validation_passed', row_count: table.rows.length });

  if (request.dry_run) {
    return { status: 'VALIDATED', site_name: siteName, row_count: table.rows.length };
  }

  // 5) Execute, best-effort per row
  const execution = await executeAssignments(validation.batch, {
    siteId: request.site_id,
    client: deps.client,
    concurrency: request.concurrency,
    sink
  });

  // 6) Persist outcome table
  const resultLocation = await persist(execution.table, 'results', request, deps, sink);
  sink.record({ type: 'run_completed', site_id: request.site_id, ...execution.summary });

  return {
    status: 'COMPLETED',
    site_name: siteName,
    table: execution.table,
    outcomes: execution.outcomes,
    summary: execution.summary,
    result_location: resultLocation
  };
}
