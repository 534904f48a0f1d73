/**
 * Raised when the GitLab API answers with an error status
 */
export class GitLabApiError extends Error {
  constructor(
    message: string,
    public status: number,
    public statusText: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'GitLabApiError';
  }
}
