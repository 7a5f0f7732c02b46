export class UnmangleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The assistant answered with something we cannot use */
export class MalformedResponseError extends UnmangleError {
  constructor(
    readonly functionName: string,
    readonly response: string,
    reason: string
  ) {
    super(`Unusable assistant response for ${functionName}: ${reason}`);
  }
}
