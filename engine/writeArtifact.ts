// engine/writeArtifact.ts
// Results Writer: serialize a table and store it under a unique, time-stamped name.

import crypto from 'crypto';

import type { ArtifactStore } from './artifactStore';
import { REPORT_SHEET_NAME, RESULTS_SHEET_NAME } from './constants';
import type { ArtifactKind } from './events';
import { serializeTable } from './tableExport';
import type { NormalizedTable, OutputFormat } from './types';

export interface WriteArtifactOptions {
  kind: ArtifactKind;
  format: OutputFormat;
  now?: Date;
}

const pad = (n: number): string => String(n).padStart(2, '0');

// YYYYMMDD_HHMMSS in local time, matching what operators see on their clock.
export function formatArtifactTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_` +
    `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
  );
}

export function buildArtifactName(
  kind: ArtifactKind,
  extension: OutputFormat,
  now: Date
): string {
  const id = crypto.randomUUID().slice(0, 8);
  return `${kind}_${formatArtifactTimestamp(now)}_${id}.${extension}`;
}

export async function writeTableArtifact(
  table: NormalizedTable,
  store: ArtifactStore,
  options: WriteArtifactOptions
): Promise<string> {
  const now = options.now ?? new Date();
  const sheetName = options.kind === 'results' ? RESULTS_SHEET_NAME : REPORT_SHEET_NAME;

  const serialized = await serializeTable(table, options.format, { sheetName, createdAt: now });
  const name = buildArtifactName(options.kind, serialized.extension, now);

  return store.save(name, serialized.content, serialized.contentType);
}
