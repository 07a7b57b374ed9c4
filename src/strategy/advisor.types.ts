export interface AdvisorClient {
  /** Returns the raw completion text. Rejects with ProviderError when the call fails. */
  complete(prompt: string, signal?: AbortSignal): Promise<string>;
}
