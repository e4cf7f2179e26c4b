import type { ImpactInfo } from '@svc-catalog/graph'
import type { ValidationSummary } from '@svc-catalog/catalog'

function formatTimestamp(ms: number): string {
  const iso = new Date(ms).toISOString()
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`
}

export function renderSummary(summary: ValidationSummary): string[] {
  const lines = [
    'Validation Summary:',
    '------------------',
    `Total services: ${summary.totalCount}`,
    `Successful: ${summary.successfulCount}`,
    `Failed: ${summary.failedCount}`,
    `Warnings: ${summary.warningCount}`,
    `Timestamp: ${formatTimestamp(summary.timestamp)}`,
  ]

  if (summary.successful.length > 0) {
    lines.push('', 'Successful services:')
    for (const service of summary.successful) lines.push(`  ✅ ${service}`)
  }

  if (summary.hasWarnings) {
    lines.push('', 'Warnings:')
    for (const [scope, warnings] of summary.warnings) {
      for (const warning of warnings) lines.push(`  ⚠️  ${scope}: ${warning}`)
    }
  }

  if (summary.failed.length > 0) {
    lines.push('', 'Failed services:')
    for (const [service, reason] of summary.failed) lines.push(`  ❌ ${service}: ${reason}`)
  }

  return lines
}

export function renderImpact(service: string, impact: readonly ImpactInfo[]): string[] {
  if (impact.length === 0) return [`No services depend on '${service}'`]
  return [
    `Services affected by '${service}':`,
    ...impact.map((info) => `  ${info.critical ? '!' : '-'} ${info.description}`),
  ]
}
