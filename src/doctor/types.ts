// ─── Checks ─────────────────────────────────────────────────────

/**
 * - `ok`: nothing to do
 * - `warning`: usable, but something is worth fixing
 * - `error`: present but broken
 * - `missing`: required and absent
 */
export type CheckStatus = 'ok' | 'warning' | 'error' | 'missing';

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  message: string;
  /** What to run or change to fix it. */
  suggestion?: string;
}

export interface DoctorReport {
  projectDir: string;
  checks: DoctorCheck[];
  /** False when any check is `error` or `missing`. */
  healthy: boolean;
}
