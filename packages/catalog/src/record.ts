import { z } from 'zod'
import type { DependencySpec } from '@svc-catalog/graph'
import { Dependency, ServiceTypeTag } from '@svc-catalog/schema'
import { CatalogError } from './errors.js'
import { initialStatus } from './status.js'
import type { ServiceRecord } from './types.js'

// Lenient read of the fields the graph needs. Anything malformed is reported later by the
// structural validator, so a bad field here never blocks registration.
const RecordProbe = z
  .object({
    version: z.string().catch(''),
    namespace: z.string().nullish().catch(undefined),
    service_type: z
      .object({ type: z.enum(ServiceTypeTag) })
      .loose()
      .optional()
      .catch(undefined),
    dependencies: z.array(z.unknown()).nullish().catch(undefined),
  })
  .loose()

export function parseConfigText(name: string, text: string): Record<string, unknown> {
  let payload: unknown
  try {
    payload = JSON.parse(text)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new CatalogError('INVALID_CONFIG', `Invalid JSON in config for '${name}': ${reason}`, {
      cause: err,
    })
  }

  const object = z.record(z.string(), z.unknown()).safeParse(payload)
  if (!object.success) {
    throw new CatalogError('INVALID_CONFIG', `Config for '${name}' must be a JSON object`)
  }
  return object.data
}

export function extractDependencies(entries: readonly unknown[]): DependencySpec[] {
  const specs: DependencySpec[] = []
  for (const entry of entries) {
    const parsed = Dependency.safeParse(entry)
    if (!parsed.success) continue
    specs.push({
      target: parsed.data.service,
      versionConstraint: parsed.data.version_constraint ?? undefined,
      required: parsed.data.required,
    })
  }
  return specs
}

/** Builds a fresh `Inactive` record; the registry key `name` wins over any name in the payload. */
export function toServiceRecord(
  name: string,
  payload: Record<string, unknown>,
  now: number = Date.now(),
): ServiceRecord {
  const probe = RecordProbe.parse(payload)
  return {
    name,
    namespace: probe.namespace ?? undefined,
    declaredVersion: probe.version,
    dependencies: extractDependencies(probe.dependencies ?? []),
    serviceTypeTag: probe.service_type?.type ?? 'unknown',
    configPayload: payload,
    status: initialStatus(now),
    lastUpdated: now,
  }
}

export function parseServiceRecord(name: string, text: string, now?: number): ServiceRecord {
  return toServiceRecord(name, parseConfigText(name, text), now)
}
