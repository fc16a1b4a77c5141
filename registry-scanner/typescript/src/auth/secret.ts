/**
 * Wrapper keeping credentials out of logs.
 * @module auth/secret
 */

const REDACTED = '[redacted]';

/**
 * Holds an access token. String conversion, JSON serialization and
 * `util.inspect` all print a placeholder; only {@link expose} returns the value.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  expose(): string {
    return this.value;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return `SecretString(${REDACTED})`;
  }
}
