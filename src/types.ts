export interface RawCommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * The primitives the engine needs from the isolation substrate. Paths are
 * paths on the host, never on the machine running the engine.
 */
export interface ExecutionHost {
  runCommand(command: string, workdir: string): Promise<RawCommandOutput>;
  putFile(data: Buffer, destPath: string): Promise<void>;
  getFile(path: string): Promise<Buffer>;
  removeRecursive(path: string): Promise<void>;
}

export interface CommandResult extends RawCommandOutput {
  output: string;
  success: boolean;
  durationMs: number;
}

export interface SafetyVerdict {
  safe: boolean;
  message: string;
}

export type DependencyWhitelist =
  | { kind: 'all' }
  | { kind: 'only'; names: ReadonlySet<string> };

export interface InstallOutcome {
  ok: boolean;
  message: string;
  installed: string[];
}

export interface ExecuteOptions {
  ignoreDependencies?: string[];
  ignoreUnsafeFunctions?: string[];
}

export interface SessionInfo {
  id: string;
  workdir: string;
  sourcePath: string;
  artifactPath: string;
}

export interface WorkspaceFile {
  name: string;
  size: number;
}
