/**
 * Desktop secret store access through libsecret's secret-tool
 */

import { AuthError } from "../errors";
import { type CommandRunner, runCommand } from "./process";

export interface SecretStore {
  /** Resolve the secret stored under these attributes, or throw AuthError */
  lookup(attributes: Record<string, string>): Promise<string>;
}

export function describeAttributes(attributes: Record<string, string>): string {
  return Object.entries(attributes)
    .map(([key, value]) => `${key}=${value}`)
    .join(", ");
}

export class SecretToolStore implements SecretStore {
  constructor(
    private readonly run: CommandRunner = runCommand,
    private readonly command: string = "secret-tool",
  ) {}

  async lookup(attributes: Record<string, string>): Promise<string> {
    const pairs = Object.entries(attributes);
    if (pairs.length === 0) {
      throw new AuthError("Secret lookup needs at least one attribute");
    }

    const args = ["lookup", ...pairs.flat()];
    const result = await this.run(this.command, args, { raw: true });
    const description = describeAttributes(attributes);

    if (!result.success) {
      const detail = result.stderr ? `: ${result.stderr}` : "";
      throw new AuthError(
        `Secret store lookup failed for ${description} (exit ${result.exitCode})${detail}`,
      );
    }

    // Whitespace belongs to the passphrase; only the final newline is dropped
    if (result.stdout.length === 0) {
      throw new AuthError(`No secret stored for ${description}`);
    }

    return result.stdout;
  }
}
