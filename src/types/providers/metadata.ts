export type ProviderMediaType = 'movie' | 'tv';

export interface ProviderMatch {
  id: number;
  title: string;
  year?: number;
}

/**
 * Lookups the classifier needs from a metadata service
 */
export interface MetadataProvider {
  searchMovie(title: string, year?: number): Promise<ProviderMatch | null>;
  searchTv(title: string): Promise<ProviderMatch | null>;
  getKeywords(id: number, mediaType: ProviderMediaType): Promise<string[]>;
}
