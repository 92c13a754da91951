// Thrown when every generated candidate collided with an existing code.
// This means the code space is (nearly) full at the configured length, which
// is a capacity problem rather than something the caller did wrong.
export class CodeSpaceExhaustedError extends Error {
  public readonly attempts: number;

  constructor(attempts: number) {
    super(`Could not generate a unique short code after ${attempts} attempts`);
    this.name = "CodeSpaceExhaustedError";
    this.attempts = attempts;
    Object.setPrototypeOf(this, CodeSpaceExhaustedError.prototype);
  }
}
