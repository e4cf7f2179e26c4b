import { InvalidTransitionError } from './errors.js'
import { ServiceState, type ServiceStatus } from './types.js'

const ALLOWED: Record<ServiceState, readonly ServiceState[]> = {
  [ServiceState.Inactive]: [ServiceState.Validating],
  [ServiceState.Validating]: [ServiceState.Validating, ServiceState.Active, ServiceState.Error],
  [ServiceState.Active]: [ServiceState.Validating],
  [ServiceState.Error]: [ServiceState.Validating],
}

export function initialStatus(now: number = Date.now()): ServiceStatus {
  return { state: ServiceState.Inactive, warnings: [], lastChecked: now }
}

export function canTransition(from: ServiceState, to: ServiceState): boolean {
  return ALLOWED[from].includes(to)
}

/**
 * Next status for a service. Entering `Validating` clears the previous outcome; `Error` requires
 * a message.
 *
 * @throws InvalidTransitionError for a move the lifecycle does not allow
 */
export function transition(
  current: ServiceStatus,
  to: ServiceState,
  opts: { errorMessage?: string; warnings?: string[]; now?: number } = {},
): ServiceStatus {
  if (!canTransition(current.state, to)) {
    throw new InvalidTransitionError(current.state, to)
  }

  const lastChecked = opts.now ?? Date.now()
  switch (to) {
    case ServiceState.Validating:
    case ServiceState.Inactive:
      return { state: to, warnings: [], lastChecked }
    case ServiceState.Active:
      return { state: to, warnings: [...(opts.warnings ?? [])], lastChecked }
    case ServiceState.Error:
      return {
        state: to,
        errorMessage: opts.errorMessage ?? 'Unknown error',
        warnings: [...(opts.warnings ?? [])],
        lastChecked,
      }
  }
}
