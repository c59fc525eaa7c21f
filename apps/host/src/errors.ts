/**
 * Host Error Classes
 */

/**
 * The asset store could not produce what was asked of it
 */
export class ResourceError extends Error {
  constructor(message: string, public readonly assetId?: string) {
    super(message);
    this.name = "ResourceError";
  }
}
