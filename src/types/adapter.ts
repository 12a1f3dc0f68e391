export interface SiteAdapterConfig {
  id: string;
  baseUrl: string;
  /** Minimum delay between requests in ms */
  rateLimitMs: number;
}

export interface SiteAdapter {
  readonly config: SiteAdapterConfig;
}
