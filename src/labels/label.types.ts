// Every requested code is present; unresolved codes map to themselves
export type CodeLabelMap = Map<string, string>;

export interface ResolvedLabels {
  relations: CodeLabelMap;
  entities: CodeLabelMap;
}
