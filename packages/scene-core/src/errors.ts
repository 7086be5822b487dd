/**
 * Error types raised by the host and the export entry point
 */

/** A host operation refused by the scene */
export class SceneHostError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SceneHostError';
  }
}

/** Export options failed validation */
export class ExportOptionsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid export options: ${issues.join('; ')}`);
    this.name = 'ExportOptionsError';
    this.issues = issues;
  }
}
