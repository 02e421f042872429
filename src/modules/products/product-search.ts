import { SqlParams } from '../../connections/db/sql';

// Text search configurations the products.tsv column is built with
export const SEARCH_LANGUAGES = ['english', 'russian'] as const;

export interface SearchClause {
  /** Predicate: the search vector matches the query of any language */
  match: string;
  /** Relevance: the best cover-density rank over the languages */
  rank: string;
}

export const normalizeSearchText = (text: string | null | undefined): string | null => {
  const trimmed = text?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
};

export const buildSearchClause = (text: string, params: SqlParams): SearchClause => {
  const ref = params.add(text);
  const queries = SEARCH_LANGUAGES.map(language => `websearch_to_tsquery('${language}', ${ref})`);

  return {
    match: `(${queries.map(query => `p.tsv @@ ${query}`).join(' OR ')})`,
    rank: `GREATEST(${queries.map(query => `ts_rank_cd(p.tsv, ${query})`).join(', ')})`,
  };
};

/**
 * Equal ranks fall back to the product id so pages stay stable across requests
 */
export const searchOrderBy = (rank: string | null): string =>
  rank ? 'rank DESC, p.id ASC' : 'p.id ASC';
