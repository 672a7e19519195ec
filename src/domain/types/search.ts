import { z } from 'zod/v4';

export const SearchHitSchema = z.object({
  title: z.string(),
  url: z.string(),
  snippet: z.string(),
  /** Provider relevance score, when the provider reports one. */
  score: z.number().optional(),
});

export type SearchHit = z.infer<typeof SearchHitSchema>;

export const SearchResultsSchema = z.object({
  hits: z.array(SearchHitSchema),
  /** Summary answer written by the provider, when it offers one. */
  answer: z.string().optional(),
});

export type SearchResults = z.infer<typeof SearchResultsSchema>;
