/**
 * Abstraction for fetching one remote page.
 * Allows testing the download loop without network requests.
 */
export interface PageSource {
  /**
   * Fetch `url` once and return the raw body bytes.
   * Rejects with a CLIError (HTTP_STATUS, NETWORK_TIMEOUT, NETWORK_UNREACHABLE)
   * when the page can't be retrieved.
   */
  fetch(url: string): Promise<Uint8Array>;
}
