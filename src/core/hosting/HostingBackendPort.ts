/**
 * Hosting Backend Port
 *
 * Capability the uploader needs from an image host: take a local file,
 * return its public URL. Implementations are checked by the compiler
 * (`implements HostingBackend`), not probed at run time.
 */

export interface HostingBackend {
  /** Human readable name, used in logs. */
  readonly name: string;

  /**
   * Upload the file at `localFilePath` and resolve to its public URL.
   *
   * @throws UploadRateLimitError when the host refuses because of rate limiting
   * @throws UploadError for any other failure
   */
  upload(localFilePath: string): Promise<string>;
}

export class UploadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UploadRateLimitError extends UploadError {}
