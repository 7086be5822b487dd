/**
 * Export Option Validators
 *
 * Zod schema for the options exportScene accepts. Missing flags take the
 * configured defaults.
 */

import { z } from 'zod';
import { exportConfig } from '../config/export.config';
import { ExportOptionsError } from '../errors';
import type { ExportOptions } from '../export/types';

const { defaults } = exportConfig;

export const exportOptionsSchema = z.object({
  filepath: z.string().trim().min(1, 'Output path is required'),
  restrictToActiveCollection: z.boolean().default(defaults.restrictToActiveCollection),
  restrictToSelection: z.boolean().default(defaults.restrictToSelection),
  moveRootsToOrigin: z.boolean().default(defaults.moveRootsToOrigin),
  exportIndividualFiles: z.boolean().default(defaults.exportIndividualFiles),
  fixAxisRotation: z.boolean().default(defaults.fixAxisRotation),
  rollback: z.boolean().default(defaults.rollback),
});

export type ExportOptionsInput = z.input<typeof exportOptionsSchema>;

/**
 * Validate and resolve export options
 */
export function parseExportOptions(input: unknown): ExportOptions {
  const result = exportOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ExportOptionsError(
      result.error.issues.map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`)
    );
  }
  return result.data;
}
