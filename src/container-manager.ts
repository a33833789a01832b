import Docker from 'dockerode';
import { v4 as uuidv4 } from 'uuid';
import { SandboxError } from './errors';
import { Logger } from './logger';

export const CONTAINER_PREFIX = 'sbx_';

export interface ContainerLimits {
  cpuQuota: number;
  memory: string;
  memorySwap: string;
}

export interface ContainerConfig {
  image: string;
  name?: string;
  user?: string;
  networkMode: string;
  limits: ContainerLimits;
  environment?: Record<string, string>;
}

// Parse memory strings like '512m', '1g', or number of bytes
export function parseMemory(val: string): number {
  const lower = val.toLowerCase();
  if (lower.endsWith('g')) return parseInt(lower, 10) * 1024 * 1024 * 1024;
  if (lower.endsWith('m')) return parseInt(lower, 10) * 1024 * 1024;
  if (lower.endsWith('k')) return parseInt(lower, 10) * 1024;
  return parseInt(lower, 10);
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === 404;
}

export class ContainerManager {
  private docker: Docker;
  private containers: Map<string, Docker.Container>;
  private logger: Logger;

  constructor(docker: Docker = new Docker(), logger: Logger = new Logger('ContainerManager')) {
    this.docker = docker;
    this.containers = new Map();
    this.logger = logger;
  }

  async pullImage(image: string): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.docker.pull(image, {}, (err: Error | null, stream: NodeJS.ReadableStream) => {
        if (err) {
          reject(err);
          return;
        }

        this.docker.modem.followProgress(stream, (progressErr: Error | null) => {
          if (progressErr) {
            reject(progressErr);
            return;
          }
          resolve();
        });
      });
    });
  }

  async createContainer(config: ContainerConfig): Promise<Docker.Container> {
    try {
      await this.pullImage(config.image);
    } catch (error) {
      this.logger.error(`Error pulling image ${config.image}:`, error);
      throw error;
    }

    const containerName = config.name ?? `${CONTAINER_PREFIX}${uuidv4()}`;
    this.logger.debug('Creating container', containerName);

    const container = await this.docker.createContainer({
      name: containerName,
      Image: config.image,
      Tty: true,
      User: config.user,
      Env: Object.entries(config.environment ?? {}).map(([key, value]) => `${key}=${value}`),
      HostConfig: {
        SecurityOpt: ['no-new-privileges'],
        Memory: parseMemory(config.limits.memory),
        MemorySwap: parseMemory(config.limits.memorySwap),
        CpuPeriod: 100000,
        CpuQuota: config.limits.cpuQuota,
        NetworkMode: config.networkMode
      },
      Cmd: ['sh', '-c', 'tail -f /dev/null']
    });

    await container.start();

    this.containers.set(container.id, container);
    return container;
  }

  /** Looks up a container someone else started; it must already be running. */
  async attachContainer(name: string): Promise<Docker.Container> {
    const container = this.docker.getContainer(name);
    try {
      const info = await container.inspect();
      if (!info.State.Running) {
        throw new SandboxError(`Container ${name} is not running.`);
      }
    } catch (error) {
      if (isNotFound(error)) {
        throw new SandboxError(`Container ${name} not found.`);
      }
      throw error;
    }
    return container;
  }

  async applyLimits(container: Docker.Container, limits: ContainerLimits): Promise<void> {
    try {
      await container.update({
        CpuQuota: limits.cpuQuota,
        Memory: parseMemory(limits.memory),
        MemorySwap: parseMemory(limits.memorySwap)
      });
    } catch (err) {
      this.logger.warn('Failed to update container resource limits:', err);
    }
  }

  isManaged(container: Docker.Container): boolean {
    return this.containers.has(container.id);
  }

  async removeContainer(container: Docker.Container): Promise<void> {
    try {
      await container.remove({ force: true });
    } catch (err) {
      this.logger.error('Error removing container:', err);
    } finally {
      this.containers.delete(container.id);
    }
  }

  /** Removes every container this manager created; attached containers are left alone. */
  async cleanup(): Promise<void> {
    for (const container of Array.from(this.containers.values())) {
      await this.removeContainer(container);
    }
    this.containers.clear();
  }
}
