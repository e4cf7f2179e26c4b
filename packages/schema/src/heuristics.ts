import { z } from 'zod'
import { ServiceTypeTag } from './types.js'

const HintProbe = z
  .object({
    description: z.string().optional().catch(undefined),
    service_type: z
      .object({ custom_type: z.string().optional().catch(undefined) })
      .loose()
      .optional()
      .catch(undefined),
    endpoints: z
      .array(
        z
          .object({ name: z.string().catch('(unnamed)'), method: z.unknown().optional() })
          .loose(),
      )
      .catch([]),
    metadata: z.record(z.string(), z.unknown()).catch({}),
  })
  .loose()

function nonEmptyList(value: unknown): boolean {
  return Array.isArray(value) && value.length > 0
}

function present(value: unknown): boolean {
  if (typeof value === 'string') return value.trim().length > 0
  return value !== undefined && value !== null
}

/**
 * Advisory checks that depend on the kind of service. They only ever produce warnings; a payload
 * too malformed to read is left to the structural validator.
 */
export function serviceTypeHints(
  service: string,
  tag: ServiceTypeTag | 'unknown',
  payload: unknown,
): string[] {
  const parsed = HintProbe.safeParse(payload ?? {})
  if (!parsed.success) return []
  const { description, endpoints, metadata } = parsed.data

  switch (tag) {
    case ServiceTypeTag.rest:
      return endpoints
        .filter((e) => !present(e.method))
        .map((e) => `Endpoint '${e.name}' of REST service '${service}' does not declare a method`)
    case ServiceTypeTag.graphql:
      return present(metadata.schema)
        ? []
        : [`GraphQL service '${service}' does not reference a schema (metadata.schema)`]
    case ServiceTypeTag.grpc:
      return nonEmptyList(metadata.proto_files)
        ? []
        : [`gRPC service '${service}' does not list proto sources (metadata.proto_files)`]
    case ServiceTypeTag.eventDriven:
      return nonEmptyList(metadata.topics)
        ? []
        : [`Event-driven service '${service}' does not declare topics (metadata.topics)`]
    case ServiceTypeTag.other:
    case 'unknown': {
      if (present(description)) return []
      const kind = parsed.data.service_type?.custom_type ?? tag
      return [`Service '${service}' of type '${kind}' has no description`]
    }
  }
}
