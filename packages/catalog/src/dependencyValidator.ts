import type { DependencyGraph, DependencySpec } from '@svc-catalog/graph'
import {
  VersionCompatibility,
  classify,
  errorsOf,
  makeReport,
  warningsOf,
  type ValidationIssue,
  type ValidationReport,
  type Validator,
} from '@svc-catalog/schema'
import type { ServiceRecord } from './types.js'

export interface DependencyFindings {
  errors: string[]
  warnings: string[]
  report: ValidationReport
}

type Subject = Pick<ServiceRecord, 'name' | 'dependencies'>

function checkVersion(
  service: string,
  dep: DependencySpec,
  constraint: string,
  actual: string,
): ValidationIssue | undefined {
  const compatibility = classify(actual, constraint)
  if (compatibility === VersionCompatibility.Compatible) return undefined

  const minor = compatibility === VersionCompatibility.MinorIncompatible
  const detail = minor
    ? `Minor version incompatibility for dependency '${dep.target}': expected ${constraint} but found ${actual}`
    : `Major version incompatibility for dependency '${dep.target}': expected ${constraint} but found ${actual}`

  if (minor) {
    return { level: 'warning', code: 'DEPENDENCY_VERSION_MINOR', message: detail, service }
  }
  if (!dep.required) {
    return {
      level: 'warning',
      code: 'DEPENDENCY_VERSION_MAJOR',
      message: `Optional dependency '${dep.target}' has incompatible version: ${detail}`,
      service,
    }
  }
  return { level: 'error', code: 'DEPENDENCY_VERSION_MAJOR', message: detail, service }
}

/** Dependency policy for one service, in declaration order. Reports, never throws. */
export class DependencyValidator implements Validator<Subject> {
  constructor(private readonly graph: DependencyGraph) {}

  public validate(subject: Subject): ValidationReport {
    const issues: ValidationIssue[] = []
    const service = subject.name

    for (const dep of subject.dependencies) {
      if (!this.graph.hasNode(dep.target)) {
        issues.push({
          level: dep.required ? 'error' : 'warning',
          code: 'DEPENDENCY_NOT_FOUND',
          message: dep.required
            ? `Required dependency '${dep.target}' not found`
            : `Optional dependency '${dep.target}' not found`,
          service,
        })
        continue
      }

      if (!dep.versionConstraint) continue

      const actual = this.graph.versionOf(dep.target)
      if (!actual) {
        issues.push({
          level: 'warning',
          code: 'DEPENDENCY_VERSION_MISSING',
          message: `Dependency '${dep.target}' has missing or invalid version in schema`,
          service,
        })
        continue
      }

      const issue = checkVersion(service, dep, dep.versionConstraint, actual)
      if (issue) issues.push(issue)
    }

    return makeReport(issues)
  }
}

export function validateDependencies(subject: Subject, graph: DependencyGraph): DependencyFindings {
  const report = new DependencyValidator(graph).validate(subject)
  return { errors: errorsOf(report), warnings: warningsOf(report), report }
}
