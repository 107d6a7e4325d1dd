export type FilterValue = string | number | boolean;

/**
 * A single predicate on one property. eq is an exact match, in matches any of the listed values.
 */
export interface Filter {
  eq?: FilterValue;
  in?: FilterValue[];
}

export interface IQueryOptions {
  filters?: { [key: string]: Filter };
}
