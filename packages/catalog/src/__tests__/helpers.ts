import { parseServiceRecord, type ServiceRecord } from '../index.js'

export interface DepInput {
  service: string
  version_constraint?: string
  required?: boolean
}

export function restConfig(
  name: string,
  version: string,
  dependencies: DepInput[] = [],
  extra: Record<string, unknown> = {},
): string {
  return JSON.stringify({
    name,
    version,
    service_type: { type: 'rest' },
    endpoints: [{ name: 'health', path: '/health', method: 'GET' }],
    dependencies,
    ...extra,
  })
}

export function record(
  name: string,
  version: string,
  dependencies: DepInput[] = [],
  extra: Record<string, unknown> = {},
): ServiceRecord {
  return parseServiceRecord(name, restConfig(name, version, dependencies, extra), 1_000)
}
