export const OBSERVABILITY_HANDLE = Symbol('OBSERVABILITY_HANDLE');
