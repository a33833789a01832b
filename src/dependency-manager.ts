import { CommandExecutor } from './command-executor';
import { ConfigurationError, HostCommandError } from './errors';
import { InstallPolicy } from './install-policies';
import { Logger } from './logger';
import { DependencyWhitelist, ExecutionHost, InstallOutcome } from './types';

export const DEPENDENCIES_INSTALLED = 'Dependencies installed successfully.';
export const DEPENDENCIES_UNINSTALLED = 'Dependencies uninstalled successfully.';

const ALLOW_EVERYTHING = '*';

export function createWhitelist(names: readonly string[]): DependencyWhitelist {
  if (names.includes(ALLOW_EVERYTHING)) {
    return { kind: 'all' };
  }
  return { kind: 'only', names: new Set(names) };
}

export interface DependencyManagerOptions {
  host: ExecutionHost;
  policy: InstallPolicy;
  whitelist: DependencyWhitelist;
  /** Directory the install, uninstall and list commands run in. */
  workdir: string;
  timeoutMs: number;
  executor?: CommandExecutor;
  logger?: Logger;
}

// A package installed for runs that are still using it.
interface Lease {
  holders: number;
  installed: Promise<boolean>;
}

/**
 * Keeps track of which packages may be installed (the whitelist) and which
 * were already present on the host (the cache). Cached packages are never
 * installed again and never rolled back; everything installed for a single
 * run is expected to be uninstalled by the caller afterwards.
 *
 * Packages installed for runs are counted per host: a second run needing the
 * same package shares the first install, and the package is removed only
 * when the last of them uninstalls it.
 */
export class DependencyManager {
  private host: ExecutionHost;
  private policy: InstallPolicy;
  private whitelist: DependencyWhitelist;
  private workdir: string;
  private timeoutMs: number;
  private executor: CommandExecutor;
  private logger: Logger;
  // lower-cased name -> name as reported by the host
  private cache: Map<string, string>;
  private leases: Map<string, Lease>;
  private removals: Map<string, Promise<void>>;

  constructor(options: DependencyManagerOptions) {
    this.host = options.host;
    this.policy = options.policy;
    this.whitelist = options.whitelist;
    this.workdir = options.workdir;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? new Logger('DependencyManager');
    this.executor = options.executor ?? new CommandExecutor(this.logger);
    this.cache = new Map();
    this.leases = new Map();
    this.removals = new Map();
  }

  /**
   * Runs the policy's setup commands, seeds the cache from the host's package
   * list and installs `cachedDependencies`, which then count as cached too.
   */
  async initialize(cachedDependencies: readonly string[] = []): Promise<void> {
    for (const command of this.policy.initCommands()) {
      await this.runOrThrow(command);
    }

    const listing = await this.runOrThrow(this.policy.listCommand());
    for (const name of this.policy.parsePackages(listing)) {
      this.addToCache(name);
    }
    this.logger.debug('Found packages:', this.listPackages().join(', '));

    const rejected = cachedDependencies.filter(dep => !this.isWhitelisted(dep));
    if (rejected.length > 0) {
      throw new ConfigurationError(`Some cached dependencies are not in the whitelist: ${rejected.join(', ')}`);
    }

    if (cachedDependencies.length > 0) {
      const outcome = await this.install(cachedDependencies);
      if (!outcome.ok) {
        throw new ConfigurationError(outcome.message);
      }
      for (const dep of cachedDependencies) {
        this.addToCache(dep);
        this.leases.delete(dep.toLowerCase());
      }
    }
  }

  isEverythingWhitelisted(): boolean {
    return this.whitelist.kind === 'all';
  }

  isWhitelisted(name: string): boolean {
    return this.whitelist.kind === 'all' || this.whitelist.names.has(name);
  }

  isCached(name: string): boolean {
    return this.cache.has(name.toLowerCase());
  }

  listPackages(): string[] {
    return Array.from(this.cache.values()).sort();
  }

  /**
   * Installs every package not already cached, in order. The whitelist is
   * checked for all names before the first command is issued. On failure the
   * packages installed so far are returned so the caller can roll them back.
   */
  async install(names: readonly string[]): Promise<InstallOutcome> {
    if (!this.isEverythingWhitelisted()) {
      for (const name of names) {
        if (!this.isWhitelisted(name)) {
          return { ok: false, message: `Dependency: ${name} is not in the whitelist.`, installed: [] };
        }
      }
    }

    const installed: string[] = [];
    for (const name of names) {
      if (this.isCached(name)) {
        this.logger.debug(`Package ${name} is already cached.`);
        continue;
      }
      if (installed.includes(name)) continue;

      if (!(await this.acquire(name))) {
        return { ok: false, message: `Failed to install dependency ${name}`, installed };
      }
      installed.push(name);
    }

    return { ok: true, message: DEPENDENCIES_INSTALLED, installed };
  }

  /**
   * Best effort: a failing uninstall is logged and the remaining packages are
   * still attempted. A package another run still holds stays installed.
   */
  async uninstall(names: readonly string[]): Promise<string> {
    for (const name of names) {
      if (this.isCached(name)) continue;

      const key = name.toLowerCase();
      const lease = this.leases.get(key);
      if (lease) {
        lease.holders -= 1;
        if (lease.holders > 0) {
          this.logger.debug(`Package ${name} is still used by ${lease.holders} other run(s).`);
          continue;
        }
        this.leases.delete(key);
      }

      const removal = this.runUninstall(name);
      this.removals.set(key, removal);
      await removal;
      if (this.removals.get(key) === removal) {
        this.removals.delete(key);
      }
    }
    return DEPENDENCIES_UNINSTALLED;
  }

  /** Joins the install of `name` another run started, or starts one. */
  private async acquire(name: string): Promise<boolean> {
    const key = name.toLowerCase();
    let lease = this.leases.get(key);
    if (lease) {
      this.logger.debug(`Package ${name} is already installed for another run.`);
    } else {
      const pendingRemoval = this.removals.get(key) ?? Promise.resolve();
      lease = { holders: 0, installed: pendingRemoval.then(() => this.runInstall(name)) };
      this.leases.set(key, lease);
    }

    lease.holders += 1;
    if (await lease.installed) {
      return true;
    }
    lease.holders -= 1;
    if (this.leases.get(key) === lease) {
      this.leases.delete(key);
    }
    return false;
  }

  private async runInstall(name: string): Promise<boolean> {
    this.logger.info(`Installing ${name} ...`);
    try {
      const result = await this.executor.run(this.host, this.policy.installCommand(name), this.workdir, this.timeoutMs);
      if (!result.success) {
        this.logger.errorLines(`${name} installation failed! Printing output ...`, result.output);
        return false;
      }
      return true;
    } catch (error) {
      this.logger.error(`${name} installation failed:`, error);
      return false;
    }
  }

  private async runUninstall(name: string): Promise<void> {
    this.logger.info(`Uninstalling ${name} ...`);
    try {
      const result = await this.executor.run(this.host, this.policy.uninstallCommand(name), this.workdir, this.timeoutMs);
      if (!result.success) {
        this.logger.errorLines(`${name} uninstall failed! Printing output ...`, result.output);
      }
    } catch (error) {
      this.logger.error(`${name} uninstall failed:`, error);
    }
  }

  private addToCache(name: string) {
    this.cache.set(name.toLowerCase(), name);
  }

  private async runOrThrow(command: string): Promise<string> {
    const result = await this.executor.run(this.host, command, this.workdir, this.timeoutMs);
    if (!result.success) {
      this.logger.errorLines(`Failed to run ${command}! See output below:`, result.output);
      throw new HostCommandError(command, result.exitCode, result.output);
    }
    return result.stdout;
  }
}
