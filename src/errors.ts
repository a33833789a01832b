export class SandboxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when the engine stops waiting for a command. The command itself may
 * still be running on the host: there is no primitive to kill it remotely.
 */
export class CommandTimeoutError extends SandboxError {
  constructor(readonly command: string, readonly timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
  }
}

export class HostCommandError extends SandboxError {
  constructor(readonly command: string, readonly exitCode: number, readonly output: string) {
    super(`Failed to run: ${command} (exit code ${exitCode})`);
  }
}

export class SessionNotFoundError extends SandboxError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
  }
}

export class SessionExistsError extends SandboxError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} already exists and is active`);
  }
}

export class PathSafetyError extends SandboxError {}

export class ConfigurationError extends SandboxError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
