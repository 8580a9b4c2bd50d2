export interface IDocumentStorage {
  /** Keys of ingestible documents under the configured prefix plus `prefix`. */
  list(prefix?: string): Promise<string[]>;
  fetch(key: string): Promise<Uint8Array>;
  healthCheck(): Promise<boolean>;
}
