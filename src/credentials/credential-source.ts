/**
 * Credential sources.
 *
 * The orchestrator resolves every credential reference once per run,
 * before any job starts. A rejected resolve() means the credential is
 * unavailable; only the sources that reference it fail.
 */

export interface CredentialSource {
  resolve(ref: string): Promise<string>;
}

export class CredentialUnavailableError extends Error {
  constructor(public ref: string, reason?: string) {
    super(reason ? `Credential "${ref}" unavailable: ${reason}` : `Credential "${ref}" unavailable`);
    this.name = 'CredentialUnavailableError';
  }
}

/** Reads each reference as an environment variable name. */
export class EnvCredentialSource implements CredentialSource {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolve(ref: string): Promise<string> {
    const value = this.env[ref];
    if (!value || value.trim().length === 0) {
      throw new CredentialUnavailableError(ref, 'environment variable is not set');
    }
    return value;
  }
}

/** Fixed reference -> secret map. */
export class StaticCredentialSource implements CredentialSource {
  private readonly secrets: Map<string, string>;

  constructor(secrets: Record<string, string>) {
    this.secrets = new Map(Object.entries(secrets));
  }

  async resolve(ref: string): Promise<string> {
    const value = this.secrets.get(ref);
    if (value === undefined) {
      throw new CredentialUnavailableError(ref);
    }
    return value;
  }
}
