// SPARQL 1.1 JSON results: { [variableName]: { type, value } }
export interface SparqlTerm {
  type?: string;
  value: string;
  'xml:lang'?: string;
}

export type SparqlBinding = Record<string, SparqlTerm>;

export interface SparqlResponse {
  head?: { vars: string[] };
  results: {
    bindings: SparqlBinding[];
  };
}

export interface WikidataLabel {
  language: string;
  value: string;
}

export interface WikidataEntity {
  id?: string;
  missing?: string;
  labels?: Record<string, WikidataLabel>;
}
