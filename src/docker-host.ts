import Docker from 'dockerode';
import { DockerHostConfigInput, parseDockerHostConfig } from './config';
import { ContainerLimits, ContainerManager } from './container-manager';
import { ConfigurationError, HostCommandError } from './errors';
import { Logger } from './logger';
import { shellJoin } from './shell';
import { ExecutionHost, RawCommandOutput } from './types';

interface ExecOutput {
  exitCode: number;
  stdout: Buffer;
  stderr: Buffer;
}

interface ExecRequest {
  cmd: string[];
  workdir?: string;
  stdin?: Buffer;
}

// Creates the parent directory, then copies stdin into "$1"
const WRITE_STDIN_SCRIPT = 'mkdir -p "$(dirname "$1")" && cat > "$1"';

export interface DockerHostOptions {
  docker?: Docker;
  logger?: Logger;
}

/**
 * Runs everything inside one Docker container. Either attaches to a container
 * that is already running (`containerName`) or pulls `image` and starts a
 * fresh one, which `close()` removes again.
 */
export class DockerExecutionHost implements ExecutionHost {
  private container: Docker.Container;
  private manager: ContainerManager;
  private user: string | undefined;
  private logger: Logger;

  constructor(container: Docker.Container, manager: ContainerManager, user?: string, logger: Logger = new Logger('DockerHost')) {
    this.container = container;
    this.manager = manager;
    this.user = user;
    this.logger = logger;
  }

  static async open(input: DockerHostConfigInput, options: DockerHostOptions = {}): Promise<DockerExecutionHost> {
    const config = parseDockerHostConfig(input);
    const logger = options.logger ?? new Logger('DockerHost');
    const manager = new ContainerManager(options.docker ?? new Docker(), logger.child('containers'));
    const limits: ContainerLimits = {
      cpuQuota: config.cpuQuota,
      memory: config.memoryLimit,
      memorySwap: config.memorySwapLimit
    };

    let container: Docker.Container;
    if (config.containerName) {
      container = await manager.attachContainer(config.containerName);
      await manager.applyLimits(container, limits);
      logger.info(`Attached to container ${config.containerName}`);
    } else if (config.image) {
      container = await manager.createContainer({
        image: config.image,
        user: config.user,
        networkMode: config.networkMode,
        limits
      });
      logger.info(`Started container ${container.id} from ${config.image}`);
    } else {
      throw new ConfigurationError('Specify exactly one of image or containerName');
    }

    return new DockerExecutionHost(container, manager, config.user, logger);
  }

  async runCommand(command: string, workdir: string): Promise<RawCommandOutput> {
    const result = await this.exec({ cmd: ['sh', '-c', command], workdir });
    return {
      exitCode: result.exitCode,
      stdout: result.stdout.toString('utf-8'),
      stderr: result.stderr.toString('utf-8')
    };
  }

  async putFile(data: Buffer, destPath: string): Promise<void> {
    const cmd = ['sh', '-c', WRITE_STDIN_SCRIPT, 'sh', destPath];
    const result = await this.exec({ cmd, stdin: data });
    this.assertSucceeded(cmd, result);
  }

  async getFile(path: string): Promise<Buffer> {
    const cmd = ['cat', '--', path];
    const result = await this.exec({ cmd });
    this.assertSucceeded(cmd, result);
    return result.stdout;
  }

  async removeRecursive(path: string): Promise<void> {
    const cmd = ['rm', '-rf', '--', path];
    const result = await this.exec({ cmd });
    this.assertSucceeded(cmd, result);
  }

  /** Removes the container if this host started it. */
  async close(): Promise<void> {
    await this.manager.cleanup();
  }

  private assertSucceeded(cmd: string[], result: ExecOutput): void {
    if (result.exitCode !== 0) {
      const stderr = result.stderr.toString('utf-8');
      this.logger.errorLines(`Command failed: ${shellJoin(cmd)}`, stderr);
      throw new HostCommandError(shellJoin(cmd), result.exitCode, stderr);
    }
  }

  private async exec({ cmd, workdir, stdin }: ExecRequest): Promise<ExecOutput> {
    const withStdin = stdin !== undefined;
    const exec = await this.container.exec({
      Cmd: cmd,
      AttachStdin: withStdin,
      AttachStdout: true,
      AttachStderr: true,
      WorkingDir: workdir,
      User: this.user
    });

    const stream = await exec.start({ hijack: true, stdin: withStdin });
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    await new Promise<void>((resolve, reject) => {
      this.container.modem.demuxStream(
        stream,
        {
          write: (chunk: Buffer) => {
            stdoutChunks.push(chunk);
          }
        },
        {
          write: (chunk: Buffer) => {
            stderrChunks.push(chunk);
          }
        }
      );
      stream.on('end', () => resolve());
      stream.on('error', reject);
      if (stdin !== undefined) {
        stream.end(stdin);
      }
    });

    const info = await exec.inspect();
    return {
      exitCode: info.ExitCode ?? 1,
      stdout: Buffer.concat(stdoutChunks),
      stderr: Buffer.concat(stderrChunks)
    };
  }
}
