export enum VersionCompatibility {
  Compatible = 'Compatible',
  /** Same major line, different minor: expected to keep working. */
  MinorIncompatible = 'MinorIncompatible',
  /** Different major line, or a version that cannot be read. */
  MajorIncompatible = 'MajorIncompatible',
}

export interface SemVer {
  major: number
  minor: number
  patch: number
  prerelease?: string
  build?: string
}

const SEMVER = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?$/

/** Strict MAJOR.MINOR.PATCH parse; ranges such as ">=1.0.0" are not versions and give undefined. */
export function parseSemVer(value: string): SemVer | undefined {
  const match = SEMVER.exec(value.trim())
  if (!match) return undefined
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
    prerelease: match[4] || undefined,
    build: match[5] || undefined,
  }
}

// Digit strings without leading zeros, so equal strings mean equal numbers at any size.
function coreOf(value: string): { major: string; minor: string } | undefined {
  const match = SEMVER.exec(value.trim())
  return match ? { major: match[1], minor: match[2] } : undefined
}

export function classify(actual: string, constraint: string): VersionCompatibility {
  const have = coreOf(actual)
  const want = coreOf(constraint)
  if (!have || !want) return VersionCompatibility.MajorIncompatible

  if (have.major !== want.major) return VersionCompatibility.MajorIncompatible
  if (have.minor !== want.minor) return VersionCompatibility.MinorIncompatible
  return VersionCompatibility.Compatible
}
