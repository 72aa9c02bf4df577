/** The renderer landed on a login or checkpoint page instead of the group */
export class SessionExpiredError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Session expired, browser was redirected to ${url}`);
    this.name = "SessionExpiredError";
    this.url = url;
  }
}

export function isSessionUrl(url: string): boolean {
  const lowered = url.toLowerCase();
  return !lowered.includes("login") && !lowered.includes("checkpoint");
}
