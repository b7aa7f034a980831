/**
 * Outcome of asking the destination to create a recipe.
 *
 * `queued` only comes back from URL imports: the destination accepted the
 * URL and will scrape it later.
 */
export type CreateResult =
  | { kind: 'created'; id: string; name: string }
  | { kind: 'already_exists' }
  | { kind: 'queued' }
  | { kind: 'rejected'; reason: string; status: number }
  | { kind: 'unavailable'; reason: string };

export interface ConnectionInfo {
  version: string;
}

export interface RecipeDestination {
  /**
   * Throws a DestinationError when the service cannot be reached or refuses
   * the credentials.
   */
  checkConnection(): Promise<ConnectionInfo>;
  createFromUrl(url: string, tags: readonly string[], categories: readonly string[]): Promise<CreateResult>;
  createFromRawContent(
    url: string,
    content: string,
    tags: readonly string[],
    categories: readonly string[],
  ): Promise<CreateResult>;
  /** Id of the tag, created when missing; null when neither works. */
  ensureTag(name: string): Promise<string | null>;
  ensureCategory(name: string): Promise<string | null>;
}
