import { config } from 'dotenv'
import { CURRENT_SCHEMA_VERSION } from '@svc-catalog/schema'
config()

export function getConfigDir(): string {
  return process.env.CATALOG_CONFIG_DIR ?? './config'
}

export function getSchemaVersion(): string {
  return process.env.CATALOG_SCHEMA_VERSION ?? CURRENT_SCHEMA_VERSION
}
