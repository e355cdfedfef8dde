export type KnowledgeSnapshot = Readonly<{
  content: string;
  version: number;
  loadedAt: Date;
  origin: 'source' | 'cache';
}>;

/** Where the knowledge document comes from. `fetch` may take seconds. */
export interface KnowledgeSource {
  readonly name: string;
  fetch(): Promise<string>;
}
