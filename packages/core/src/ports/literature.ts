import { type RuntimeResource } from '../lifecycle';

export interface Paper {
  id: string;
  title: string;
  authors: string[];
  year: number | null;
  abstract: string;
}

export interface LiteratureResult {
  totalResults: number;
  papers: Paper[];
}

export interface LiteratureSearchPort extends RuntimeResource {
  search(query: string, options?: { signal?: AbortSignal | undefined }): Promise<LiteratureResult>;
}
