/**
 * Secret string wrapper.
 * @module auth/secret
 */

/**
 * Holds a credential value and keeps it out of logs and JSON output.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }

  isEmpty(): boolean {
    return this.value.length === 0;
  }
}
