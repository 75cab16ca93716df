export { isCandidate, createSelector, hasCandidateService, selectServices } from './candidate.js';
export type { ServiceSelector } from './candidate.js';
