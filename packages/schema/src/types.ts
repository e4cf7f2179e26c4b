import { z } from 'zod'

export const CURRENT_SCHEMA_VERSION = '1.0.0'

export const ServiceNameRef = z.string().min(1).max(255)
export type ServiceNameRefType = z.infer<typeof ServiceNameRef>

export enum ServiceTypeTag {
  rest = 'rest',
  grpc = 'grpc',
  graphql = 'graphql',
  eventDriven = 'eventdriven',
  other = 'other',
}

export const ServiceType = z.object({
  type: z.enum(ServiceTypeTag),
  custom_type: z.string().optional(),
})
export type ServiceTypeType = z.infer<typeof ServiceType>

export const Endpoint = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
  method: z.string().optional(),
  description: z.string().optional(),
})
export type EndpointType = z.infer<typeof Endpoint>

export const Dependency = z.object({
  service: ServiceNameRef,
  version_constraint: z.string().nullish(),
  required: z.boolean().default(true),
})
export type DependencyType = z.infer<typeof Dependency>

export const ServiceConfig = z.object({
  name: ServiceNameRef,
  version: z.string().min(1),
  description: z.string().optional(),
  owner: z.string().optional(),
  documentation_url: z.url().optional(),
  namespace: z.string().nullish(),
  schema_version: z.string().default(CURRENT_SCHEMA_VERSION),
  service_type: ServiceType,
  endpoints: z.array(Endpoint),
  dependencies: z.array(Dependency).nullish(),
  metadata: z.record(z.string(), z.unknown()).default({}),
})
export type ServiceConfigType = z.infer<typeof ServiceConfig>
