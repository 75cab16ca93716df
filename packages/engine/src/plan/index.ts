export { buildManagerPlan, REFRESH_DOC_PREAMBLE } from './manager-plan.js';
