/**
 * Raised when a project or output path fails validation.
 */
export class ProjectPathError extends Error {
  public readonly code = 'INVALID_PROJECT_PATH';
  public readonly path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = 'ProjectPathError';
    this.path = path;
  }
}
