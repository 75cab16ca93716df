import type { FileDescriptor, ServiceDescriptor } from '../types.js';
import { DEFAULT_SUFFIX } from '../types.js';

export type ServiceSelector = (service: ServiceDescriptor) => boolean;

/**
 * A service takes part in generation when its name ends with the marker
 * suffix. The match is case-sensitive and a name equal to the suffix
 * itself qualifies.
 */
export function isCandidate(service: ServiceDescriptor, suffix: string = DEFAULT_SUFFIX): boolean {
  return service.name.endsWith(suffix);
}

/** Bind the candidate check to a configured marker suffix */
export function createSelector(suffix: string = DEFAULT_SUFFIX): ServiceSelector {
  return service => isCandidate(service, suffix);
}

export function hasCandidateService(file: FileDescriptor, selector: ServiceSelector): boolean {
  return file.services.some(selector);
}

export function selectServices(file: FileDescriptor, selector: ServiceSelector): ServiceDescriptor[] {
  return file.services.filter(selector);
}
