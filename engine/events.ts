// engine/events.ts
// Structured pipeline events. The engine records; adapters decide rendering.

import type { ErrorCode } from './errorCodes';

export type PipelineEvent =
  | { type: 'input_read'; file: string; row_count: number; column_count: number }
  | { type: 'schema_rejected'; missing_columns: string[] }
  | { type: 'inventory_fetched'; serial_count: number }
  | { type: 'validation_failed'; issue_count: number; row_count: number }
  | { type: 'validation_passed'; row_count: number }
  | { type: 'row_assigned'; row: number; serial: string; mac: string; site_id: string }
  | {
      type: 'row_failed';
      row: number;
      serial: string;
      mac: string;
      site_id: string;
      error: string;
      code?: ErrorCode;
    }
  | { type: 'artifact_written'; kind: ArtifactKind; location: string }
  | { type: 'artifact_write_failed'; kind: ArtifactKind; error: string }
  | { type: 'run_completed'; site_id: string; success: number; failed: number; total: number };

export type ArtifactKind = 'results' | 'validation_report';

export interface PipelineEventSink {
  record(event: PipelineEvent): void;
}

type LogLevel = 'info' | 'warn' | 'error';

function levelFor(event: PipelineEvent): LogLevel {
  switch (event.type) {
    case 'row_failed':
    case 'artifact_write_failed':
      return 'error';
    case 'schema_rejected':
    case 'validation_failed':
      return 'warn';
    default:
      return event.type === 'run_completed' && event.failed > 0 ? 'warn' : 'info';
  }
}

/**
 * One JSON line per event on the console:
 *   {"level":"info","service":"ap-site-import","event":"row_assigned",...}
 */
export function createConsoleEventSink(service = 'ap-site-import'): PipelineEventSink {
  return {
    record(event) {
      const { type, ...ctx } = event;
      const level = levelFor(event);
      const line = JSON.stringify({ level, service, event: type, ...ctx });

      if (level === 'error') console.error(line);
      else if (level === 'warn') console.warn(line);
      else console.info(line);
    }
  };
}

export const noopEventSink: PipelineEventSink = {
  record() {
    // intentionally empty
  }
};
