export interface InputConfigurationIssue {
  readonly code: string;
  readonly message: string;
  readonly path: readonly (string | number)[];
}

/**
 * Raised when a binding table is rejected at registration time.
 *
 * Frame evaluation itself never throws; only building an invalid context does.
 */
export class InputConfigurationError extends Error {
  readonly issues: readonly InputConfigurationIssue[];

  constructor(message: string, issues: readonly InputConfigurationIssue[] = []) {
    super(message);
    this.name = 'InputConfigurationError';
    this.issues = issues;
  }
}
