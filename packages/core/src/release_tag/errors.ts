/**
 * Error thrown when a release tag is missing or unusable
 */
export class InvalidReleaseTagError extends Error {
  public readonly releaseTag: string;

  constructor(message: string, releaseTag: string) {
    super(message);
    this.name = 'InvalidReleaseTagError';
    this.releaseTag = releaseTag;
    Object.setPrototypeOf(this, InvalidReleaseTagError.prototype);
  }
}
