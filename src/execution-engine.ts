import AdmZip from 'adm-zip';
import { posix } from 'path';
import { CommandExecutor } from './command-executor';
import { EngineConfig, EngineConfigInput, parseEngineConfig } from './config';
import { createWhitelist, DependencyManager } from './dependency-manager';
import { ConfigurationError, HostCommandError } from './errors';
import { InstallPolicyRegistry } from './install-policies';
import { Logger, Verbosity } from './logger';
import { assertSafeFilename } from './path-safety';
import { checkCode } from './policy-gate';
import { Session, SessionRuntime } from './session';
import { SessionManager } from './session-manager';
import { ExecuteOptions, ExecutionHost, SafetyVerdict, SessionInfo, WorkspaceFile } from './types';

const HOME_COMMAND = 'echo "$HOME"';

async function resolveBaseDir(
  host: ExecutionHost,
  executor: CommandExecutor,
  config: EngineConfig
): Promise<string> {
  if (config.baseDir) {
    return config.baseDir;
  }
  const result = await executor.run(host, HOME_COMMAND, '/', config.commandTimeoutMs);
  if (!result.success) {
    throw new HostCommandError(HOME_COMMAND, result.exitCode, result.output);
  }
  const home = result.stdout.trim();
  if (!posix.isAbsolute(home)) {
    throw new ConfigurationError(`Could not determine the home directory on the host (got ${JSON.stringify(home)})`);
  }
  return home;
}

/**
 * Entry point for transports: every operation takes a session id and returns
 * plain values. Code is never run on the machine hosting the engine, only on
 * the execution host.
 */
export class ExecutionEngine {
  private sessions: SessionManager;
  private dependencies: DependencyManager;
  private logger: Logger;

  private constructor(sessions: SessionManager, dependencies: DependencyManager, logger: Logger) {
    this.sessions = sessions;
    this.dependencies = dependencies;
    this.logger = logger;
  }

  static async create(
    host: ExecutionHost,
    configInput: EngineConfigInput = {},
    logger: Logger = new Logger('ExecutionEngine')
  ): Promise<ExecutionEngine> {
    const config = parseEngineConfig(configInput);
    logger.setVerbosity(config.verbosity);

    const executor = new CommandExecutor(logger.child('exec'));
    const baseDir = await resolveBaseDir(host, executor, config);
    logger.debug(`Using base directory ${baseDir}`);

    const policy = InstallPolicyRegistry.get(config.installPolicy);
    if (!policy) {
      throw new ConfigurationError(`Unknown install policy: ${config.installPolicy}`);
    }

    const dependencies = new DependencyManager({
      host,
      policy,
      whitelist: createWhitelist(config.dependencyWhitelist),
      workdir: baseDir,
      timeoutMs: config.installTimeoutMs,
      executor,
      logger: logger.child('deps')
    });
    await dependencies.initialize(config.cachedDependencies);

    const runtime: SessionRuntime = {
      host,
      executor,
      dependencies,
      interpreter: config.interpreter,
      executionTimeoutMs: config.defaultTimeoutMs,
      commandTimeoutMs: config.commandTimeoutMs,
      logger: logger.child('session')
    };

    return new ExecutionEngine(new SessionManager(runtime, baseDir), dependencies, logger);
  }

  setVerbosity(level: Verbosity) {
    this.logger.setVerbosity(level);
  }

  async createSession(name?: string): Promise<SessionInfo> {
    const session = await this.sessions.create(name);
    this.logger.info(`Session ${session.name} created`);
    return session.info();
  }

  getSessionInfo(sessionId: string): SessionInfo {
    return this.sessions.get(sessionId).info();
  }

  listSessions(): string[] {
    return this.sessions.list();
  }

  async closeSession(sessionId: string): Promise<void> {
    await this.sessions.close(this.sessions.get(sessionId));
    this.logger.info(`Session ${sessionId} closed`);
  }

  async executeCode(sessionId: string, code: string, options: ExecuteOptions = {}): Promise<string> {
    return this.session(sessionId).run(code, options);
  }

  /** Stores `data` as `src/<filename>` in the session and returns where it landed. */
  async uploadFile(sessionId: string, filename: string, data: Buffer): Promise<string> {
    const session = this.session(sessionId);
    assertSafeFilename(filename);
    return session.writeSource(filename, data);
  }

  async downloadFile(sessionId: string, path: string): Promise<Buffer> {
    return this.session(sessionId).readArtifact(path);
  }

  async listArtifacts(sessionId: string): Promise<WorkspaceFile[]> {
    return this.session(sessionId).listArtifacts();
  }

  async listSources(sessionId: string): Promise<WorkspaceFile[]> {
    return this.session(sessionId).listSources();
  }

  /** Zips every file currently in the session's artifact directory. */
  async archiveArtifacts(sessionId: string): Promise<Buffer> {
    const session = this.session(sessionId);
    const zip = new AdmZip();
    for (const file of await session.listArtifacts()) {
      zip.addFile(file.name, await session.readArtifact(file.name));
    }
    return zip.toBuffer();
  }

  listPackages(): string[] {
    return this.dependencies.listPackages();
  }

  checkCode(code: string, ignoreUnsafeFunctions: readonly string[] = []): SafetyVerdict {
    return checkCode(code, ignoreUnsafeFunctions);
  }

  async shutdown(): Promise<void> {
    this.logger.debug('Shutting down, closing sessions:', this.sessions.list().join(', '));
    await this.sessions.closeAll();
  }

  private session(sessionId: string): Session {
    return this.sessions.get(sessionId);
  }
}
