/**
 * Human-readable rendering of doctor diagnostics.
 */

import type { DiagnosticStatus, DoctorReport } from '../../core/doctor.js';
import { getPalette, severitySymbol, type Severity } from './colors.js';
import type { RenderOptions } from './validation.js';

const SEVERITY: Record<DiagnosticStatus, Severity> = {
  ok: 'pass',
  warning: 'warn',
  error: 'fail',
};

export function renderDoctor(report: DoctorReport, options: RenderOptions): string {
  const palette = getPalette(options.color);
  const errors = report.checks.filter((c) => c.status === 'error').length;
  const warnings = report.checks.filter((c) => c.status === 'warning').length;

  const lines: string[] = [];
  const statusText = errors === 0
    ? `${palette.GREEN}${palette.BOLD}HEALTHY${palette.NC}`
    : `${palette.RED}${palette.BOLD}UNHEALTHY${palette.NC}`;
  lines.push(`Environment Status: ${statusText}`);
  if (errors > 0) lines.push(`  ${palette.RED}Errors: ${errors}${palette.NC}`);
  if (warnings > 0) lines.push(`  ${palette.YELLOW}Warnings: ${warnings}${palette.NC}`);
  lines.push('');

  for (const check of report.checks) {
    lines.push(`  ${severitySymbol(SEVERITY[check.status], palette)} ${check.message}`);
    if (check.fix) lines.push(`    Fix: ${check.fix}`);
  }
  return lines.join('\n');
}
