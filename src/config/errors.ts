export interface ValidationIssue {
  readonly severity: "error" | "warning"
  readonly path: string
  readonly message: string
}

export const formatValidationIssues = (issues: readonly ValidationIssue[]): string[] =>
  issues.map((issue) => `${issue.severity.toUpperCase()} ${issue.path}: ${issue.message}`)

export class ConfigError extends Error {
  readonly issues: readonly ValidationIssue[]

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(issues.length > 0 ? `${message}\n${formatValidationIssues(issues).join("\n")}` : message)
    this.name = "ConfigError"
    this.issues = issues
  }
}
