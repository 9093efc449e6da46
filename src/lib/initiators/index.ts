export { classify, effectivePortType } from './classify';
export { computeAdditions, computeRemovals, isSubset } from './diff';
export { validateInitiatorAuth } from './auth';
