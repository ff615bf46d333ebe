// Message composer: one status line per finished render job.
// Pure function -- no I/O, never throws.

import type { RenderJobResult } from '../types/index.js';

export const UNSPECIFIED_ERROR = 'unspecified';

/**
 * Build the single-line status text shared by Slack and the desktop notification.
 *
 *   Complete [MyProject] Timeline_01 → master_prores.mov
 *   Failed [MyProject] Timeline_01 → master_prores.mov (Error: disk full)
 */
export function composeMessage(job: RenderJobResult): string {
  const line = `${job.status} [${job.projectName}] ${job.timelineName} → ${job.outputFilename}`;
  if (job.status === 'Complete') {
    return line;
  }
  // Host error text can span lines; the status line must not.
  const detail = job.errorDetail?.trim().replace(/\s*\r?\n\s*/g, ' ') || UNSPECIFIED_ERROR;
  return `${line} (Error: ${detail})`;
}
