export const HTTP_DISPATCHER = 'HTTP_DISPATCHER';

export const SPARQL_RESULTS_JSON = 'application/sparql-results+json';
export const JSON_CONTENT = 'application/json';
