import { posix } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { CommandExecutor } from './command-executor';
import { extractDependencies } from './dependency-extractor';
import { DependencyManager } from './dependency-manager';
import { CommandTimeoutError, HostCommandError, errorMessage } from './errors';
import { Logger } from './logger';
import { resolveArtifactPath } from './path-safety';
import { checkCode } from './policy-gate';
import { shellJoin, shellQuote } from './shell';
import { ExecuteOptions, ExecutionHost, SessionInfo, WorkspaceFile } from './types';

export const EXECUTION_TIMED_OUT = 'Error: Execution timed out.';

function sessionClosedMessage(name: string): string {
  return `Error: Session ${name} is closed.`;
}

const SOURCE_DIR = 'src';
const ARTIFACT_DIR = 'artifacts';
const LIST_FILES_COMMAND = "find . -maxdepth 1 -type f -printf '%f\\t%s\\n'";

/** Collaborators every session of one engine shares. */
export interface SessionRuntime {
  host: ExecutionHost;
  executor: CommandExecutor;
  dependencies: DependencyManager;
  interpreter: string;
  executionTimeoutMs: number;
  /** Bound for housekeeping commands such as creating directories or listing files. */
  commandTimeoutMs: number;
  logger: Logger;
}

export function parseFileListing(output: string): WorkspaceFile[] {
  const files: WorkspaceFile[] = [];
  for (const line of output.split(/\r?\n/)) {
    const tab = line.lastIndexOf('\t');
    if (tab <= 0) continue;
    const size = Number(line.slice(tab + 1));
    if (!Number.isFinite(size)) continue;
    files.push({ name: line.slice(0, tab), size });
  }
  return files.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * A named workspace on the execution host: `<base>/<name>` with a `src`
 * directory for files the caller provides and an `artifacts` directory for
 * files the code produces.
 */
export class Session {
  readonly name: string;
  readonly workdir: string;
  readonly sourcePath: string;
  readonly artifactPath: string;
  private runtime: SessionRuntime;
  private logger: Logger;
  private queue: Promise<unknown>;
  private closed: boolean;

  private constructor(name: string, baseDir: string, runtime: SessionRuntime) {
    this.name = name;
    this.workdir = posix.join(baseDir, name);
    this.sourcePath = posix.join(this.workdir, SOURCE_DIR);
    this.artifactPath = posix.join(this.workdir, ARTIFACT_DIR);
    this.runtime = runtime;
    this.logger = runtime.logger.child(name);
    this.queue = Promise.resolve();
    this.closed = false;
  }

  /** Creates the workspace directories on the host. */
  static async open(name: string, baseDir: string, runtime: SessionRuntime): Promise<Session> {
    const session = new Session(name, baseDir, runtime);
    await session.runHousekeeping(shellJoin(['mkdir', '-p', session.workdir, session.sourcePath, session.artifactPath]), baseDir);
    session.logger.info(`Created session workspace ${session.workdir}`);
    return session;
  }

  info(): SessionInfo {
    return {
      id: this.name,
      workdir: this.workdir,
      sourcePath: this.sourcePath,
      artifactPath: this.artifactPath
    };
  }

  /**
   * Checks, stages and runs `code`, returning its combined output. Never
   * rejects: policy rejections, dependency failures, timeouts and host faults
   * all come back as text. Runs within one session are serialized; once
   * the session is being destroyed no new run is accepted.
   */
  run(code: string, options: ExecuteOptions = {}): Promise<string> {
    if (this.closed) {
      return Promise.resolve(sessionClosedMessage(this.name));
    }
    const task = () => this.execute(code, options);
    const next = this.queue.then(task, task);
    this.queue = next;
    return next;
  }

  async writeSource(filename: string, data: Buffer): Promise<string> {
    const destination = posix.join(this.sourcePath, filename);
    await this.runtime.host.putFile(data, destination);
    this.logger.info(`Uploaded ${filename} to ${destination}`);
    return destination;
  }

  /** Reads a file below `artifacts/`; anything resolving elsewhere is refused before the host is asked. */
  async readArtifact(requested: string): Promise<Buffer> {
    const path = resolveArtifactPath(this.artifactPath, requested);
    this.logger.debug(`Downloading ${path}`);
    return this.runtime.host.getFile(path);
  }

  async listSources(): Promise<WorkspaceFile[]> {
    return parseFileListing(await this.runHousekeeping(LIST_FILES_COMMAND, this.sourcePath));
  }

  async listArtifacts(): Promise<WorkspaceFile[]> {
    return parseFileListing(await this.runHousekeeping(LIST_FILES_COMMAND, this.artifactPath));
  }

  /** Waits for the runs already queued, then removes the whole workspace from the host. */
  async destroy(): Promise<void> {
    this.closed = true;
    await this.queue;
    await this.runtime.host.removeRecursive(this.workdir);
    this.logger.info(`Removed session workspace ${this.workdir}`);
  }

  private async execute(code: string, options: ExecuteOptions): Promise<string> {
    const { host, executor, dependencies } = this.runtime;
    let scriptPath: string | undefined;
    let installed: string[] = [];

    try {
      const verdict = checkCode(code, options.ignoreUnsafeFunctions ?? []);
      if (!verdict.safe) {
        this.logger.info(`Rejected code: ${verdict.message}`);
        return verdict.message;
      }

      scriptPath = posix.join(this.sourcePath, `script_${uuidv4().replace(/-/g, '')}.py`);
      await host.putFile(Buffer.from(code, 'utf-8'), scriptPath);

      const ignored = new Set(options.ignoreDependencies ?? []);
      const required = extractDependencies(code).filter(dep => !ignored.has(dep));
      const outcome = await dependencies.install(required);
      installed = outcome.installed;
      if (!outcome.ok) {
        return outcome.message;
      }

      try {
        const command = `${this.runtime.interpreter} ${shellQuote(scriptPath)}`;
        const result = await executor.run(host, command, this.workdir, this.runtime.executionTimeoutMs);
        this.logger.debug(`Exit code ${result.exitCode} after ${result.durationMs}ms`);
        return result.output;
      } catch (error) {
        if (error instanceof CommandTimeoutError) {
          this.logger.warn(`Execution timed out after ${error.timeoutMs}ms; the process may still be running on the host`);
          return EXECUTION_TIMED_OUT;
        }
        throw error;
      }
    } catch (error) {
      this.logger.error('Execution failed:', error);
      return `Error: ${errorMessage(error)}`;
    } finally {
      await this.cleanUp(scriptPath, installed);
    }
  }

  private async cleanUp(scriptPath: string | undefined, installed: string[]): Promise<void> {
    if (scriptPath) {
      try {
        await this.runtime.host.removeRecursive(scriptPath);
      } catch (error) {
        this.logger.warn(`Failed to remove ${scriptPath}:`, errorMessage(error));
      }
    }
    if (installed.length > 0) {
      try {
        await this.runtime.dependencies.uninstall(installed);
      } catch (error) {
        this.logger.warn('Failed to roll back dependencies:', errorMessage(error));
      }
    }
  }

  private async runHousekeeping(command: string, workdir: string): Promise<string> {
    const result = await this.runtime.executor.run(this.runtime.host, command, workdir, this.runtime.commandTimeoutMs);
    if (!result.success) {
      throw new HostCommandError(command, result.exitCode, result.output);
    }
    return result.stdout;
  }
}
