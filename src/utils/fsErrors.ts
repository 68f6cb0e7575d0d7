/**
 * File-system related errors
 */

/**
 * Error thrown when a required input file does not exist.
 */
export class NotFoundError extends Error {
  public readonly path: string;

  constructor(what: string, path: string) {
    super(`${what} not found: ${path}`);
    this.name = "NotFoundError";
    this.path = path;
  }
}
