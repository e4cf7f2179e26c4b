import { z, ZodError } from 'zod'
import { makeLogger, type Logger } from '@svc-catalog/logger'
import { CURRENT_SCHEMA_VERSION, ServiceConfig, type ServiceConfigType } from './types.js'
import { classify, VersionCompatibility } from './version.js'

export type StructuralResult = { ok: true; warnings: string[] } | { ok: false; errors: string[] }

/** Checks the shape of a configuration payload. Never throws. */
export interface StructuralValidator {
  validate(payload: unknown): StructuralResult
}

export function formatIssues(err: ZodError): string[] {
  return err.issues.map((issue) => {
    const where = issue.path.map((p) => String(p)).join('.')
    return where ? `${where}: ${issue.message}` : issue.message
  })
}

const SchemaVersionProbe = z.object({ schema_version: z.string().optional() }).loose()

/**
 * Validates payloads against the catalog's service schema after checking that the payload's
 * `schema_version` is on the same major line as the schema this build understands.
 */
export class ZodStructuralValidator implements StructuralValidator {
  private readonly logger: Logger

  constructor(
    private readonly schema: z.ZodType<ServiceConfigType> = ServiceConfig,
    private readonly currentVersion: string = CURRENT_SCHEMA_VERSION,
  ) {
    this.logger = makeLogger('ZodStructuralValidator', { schemaVersion: currentVersion })
  }

  public validate(payload: unknown): StructuralResult {
    const warnings: string[] = []

    const probe = SchemaVersionProbe.safeParse(payload)
    const configVersion = (probe.success && probe.data.schema_version) || this.currentVersion

    switch (classify(configVersion, this.currentVersion)) {
      case VersionCompatibility.MajorIncompatible:
        return {
          ok: false,
          errors: [
            `Schema version ${configVersion} is incompatible with current version ${this.currentVersion}`,
          ],
        }
      case VersionCompatibility.MinorIncompatible:
        this.logger.warn('minor schema version drift', { configVersion })
        warnings.push(
          `Minor schema version incompatibility: config version ${configVersion} vs current ${this.currentVersion}`,
        )
        break
      case VersionCompatibility.Compatible:
        break
    }

    const parsed = this.schema.safeParse(payload)
    if (!parsed.success) {
      return { ok: false, errors: formatIssues(parsed.error) }
    }
    return { ok: true, warnings }
  }
}
