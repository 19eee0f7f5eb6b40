/**
 * Human-readable rendering of a validation report.
 */

import type { ValidationReport } from '../../core/validation/validate.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getPalette, severitySymbol } from './colors.js';

export interface RenderOptions {
  color: boolean;
}

export function renderValidation(report: ValidationReport, options: RenderOptions): string {
  const palette = getPalette(options.color);
  const lines: string[] = [
    `${palette.BOLD}Pyve Installation Validation${palette.NC}`,
    '==============================',
    '',
  ];

  for (const check of report.checks) {
    lines.push(`${severitySymbol(check.status, palette)} ${check.label}: ${check.detail}`);
    if (check.fix) lines.push(`  ${check.fix}`);
  }

  lines.push('');
  switch (report.exitCode) {
    case ExitCode.SUCCESS:
      lines.push(`${palette.GREEN}All validations passed.${palette.NC}`);
      break;
    case ExitCode.WARNINGS:
      lines.push(`${palette.YELLOW}Validation completed with warnings.${palette.NC}`);
      break;
    default:
      lines.push(`${palette.RED}Validation completed with errors.${palette.NC}`);
  }
  return lines.join('\n');
}
