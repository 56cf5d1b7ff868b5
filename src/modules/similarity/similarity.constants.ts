export const SIMILARITY_SEARCH = Symbol('SIMILARITY_SEARCH');
export const SIMILARITY_METRIC = Symbol('SIMILARITY_METRIC');
