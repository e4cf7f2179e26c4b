export type ValidationLevel = 'error' | 'warning' | 'info'

export type ValidationCode =
  | 'DEPENDENCY_NOT_FOUND'
  | 'DEPENDENCY_VERSION_MISSING'
  | 'DEPENDENCY_VERSION_MINOR'
  | 'DEPENDENCY_VERSION_MAJOR'

export interface ValidationIssue {
  level: ValidationLevel
  code: ValidationCode
  message: string
  service?: string
}

export interface ValidationReport {
  ok: boolean
  issues: ValidationIssue[]
}

export interface Validator<T> {
  validate(subject: T): ValidationReport // do not throw; report issues
}

export function makeReport(issues: ValidationIssue[]): ValidationReport {
  return { ok: !issues.some((i) => i.level === 'error'), issues }
}

export function errorsOf(report: ValidationReport): string[] {
  return report.issues.filter((i) => i.level === 'error').map((i) => i.message)
}

export function warningsOf(report: ValidationReport): string[] {
  return report.issues.filter((i) => i.level === 'warning').map((i) => i.message)
}
