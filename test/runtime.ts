import { CommandExecutor } from '../src/command-executor';
import { DependencyManager, createWhitelist } from '../src/dependency-manager';
import { PipInstallPolicy } from '../src/install-policies';
import { Logger } from '../src/logger';
import { SessionRuntime } from '../src/session';
import { HOME, InMemoryHost } from './in-memory-host';

export interface RuntimeOptions {
  whitelist?: string[];
  executionTimeoutMs?: number;
}

export function quietLogger(): Logger {
  return new Logger('test', 'silent');
}

export function createRuntime(host: InMemoryHost, options: RuntimeOptions = {}): SessionRuntime {
  const logger = quietLogger();
  const executor = new CommandExecutor(logger);
  const dependencies = new DependencyManager({
    host,
    policy: new PipInstallPolicy(),
    whitelist: createWhitelist(options.whitelist ?? ['*']),
    workdir: HOME,
    timeoutMs: 1000,
    executor,
    logger
  });

  return {
    host,
    executor,
    dependencies,
    interpreter: 'python',
    executionTimeoutMs: options.executionTimeoutMs ?? 1000,
    commandTimeoutMs: 1000,
    logger
  };
}
