import { detectCycles, type DependencyGraph } from '@svc-catalog/graph'
import { makeLogger, type Logger } from '@svc-catalog/logger'
import {
  SchemaStructuralError,
  ZodStructuralValidator,
  serviceTypeHints,
  type StructuralValidator,
} from '@svc-catalog/schema'
import { CATALOG_CONSTANTS } from '@svc-catalog/utils'
import { buildGraph } from './builder.js'
import { validateDependencies } from './dependencyValidator.js'
import { DependencyPolicyError } from './errors.js'
import { transition } from './status.js'
import { ServiceState, ValidationSummary, type ServiceRecord } from './types.js'

export interface CatalogValidationOptions {
  structuralValidator?: StructuralValidator
  logger?: Logger
  now?: () => number
}

function checkService(
  record: ServiceRecord,
  graph: DependencyGraph,
  validator: StructuralValidator,
): string[] {
  const deps = validateDependencies(record, graph)
  if (deps.errors.length > 0) {
    throw new DependencyPolicyError(record.name, deps.errors, deps.warnings)
  }

  const structural = validator.validate(record.configPayload)
  if (!structural.ok) {
    throw new SchemaStructuralError(record.name, structural.errors, deps.warnings)
  }

  return [
    ...deps.warnings,
    ...structural.warnings,
    ...serviceTypeHints(record.name, record.serviceTypeTag, record.configPayload),
  ]
}

/**
 * One validation pass over the given records. Each record's `status` is replaced in place and
 * ends `Active` or `Error`; a failing service never stops the others.
 */
export function runCatalogValidation(
  records: ServiceRecord[],
  options: CatalogValidationOptions = {},
): ValidationSummary {
  const log = options.logger ?? makeLogger('orchestrator')
  const validator = options.structuralValidator ?? new ZodStructuralValidator()
  const now = options.now ?? Date.now
  const summary = new ValidationSummary(now())

  const graph = buildGraph(records)
  const cycle = detectCycles(graph)
  const inCycle = new Set(cycle?.path ?? [])
  if (cycle) {
    log.warn('circular dependency in catalog', { path: cycle.path })
    summary.addWarning(
      CATALOG_CONSTANTS.SYSTEM_SCOPE,
      `Circular dependency detected: ${cycle.description}`,
    )
  }

  for (const record of records) {
    record.status = transition(record.status, ServiceState.Validating, { now: now() })

    const warnings: string[] = []
    if (cycle && inCycle.has(record.name)) {
      warnings.push(`Service participates in circular dependency: ${cycle.description}`)
    }

    try {
      warnings.push(...checkService(record, graph, validator))
      summary.successful.push(record.name)
      record.status = transition(record.status, ServiceState.Active, { warnings, now: now() })
    } catch (err) {
      let reason: string
      if (err instanceof DependencyPolicyError || err instanceof SchemaStructuralError) {
        warnings.push(...err.warnings)
        reason = err.message
      } else {
        const text = err instanceof Error ? err.message : String(err)
        log.error('unexpected failure while validating service', {
          service: record.name,
          err: text,
        })
        reason = `Internal error while validating: ${text}`
      }
      summary.failed.push([record.name, reason])
      record.status = transition(record.status, ServiceState.Error, {
        errorMessage: reason,
        warnings,
        now: now(),
      })
    }

    for (const warning of warnings) summary.addWarning(record.name, warning)
  }

  log.info('catalog validation finished', {
    successful: summary.successfulCount,
    failed: summary.failedCount,
    warnings: summary.warningCount,
  })
  return summary
}
