import { CommandTimeoutError, errorMessage } from './errors';
import { Logger } from './logger';
import { CommandResult, ExecutionHost } from './types';

/**
 * Runs single commands against an execution host under a wall-clock bound.
 *
 * Known limitation: when the bound expires the executor only stops waiting.
 * The host interface has no kill primitive, so a timed-out command may keep
 * running on the host until the host itself cleans it up. Whatever it prints
 * afterwards is discarded.
 */
export class CommandExecutor {
  private logger: Logger;

  constructor(logger: Logger = new Logger('CommandExecutor')) {
    this.logger = logger;
  }

  async run(host: ExecutionHost, command: string, workdir: string, timeoutMs: number): Promise<CommandResult> {
    const startTime = Date.now();
    this.logger.debug(`Running ${command} in ${workdir}`);

    const pending = host.runCommand(command, workdir);
    let timer: NodeJS.Timeout | undefined;
    let timedOut = false;

    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(new CommandTimeoutError(command, timeoutMs));
      }, timeoutMs);
    });

    // Settles after the deadline are only logged
    void pending.then(
      () => {
        if (timedOut) this.logger.debug('Discarding output of timed-out command:', command);
      },
      error => {
        if (timedOut) this.logger.warn('Timed-out command failed later:', command, errorMessage(error));
      }
    );

    try {
      const raw = await Promise.race([pending, deadline]);
      const output = raw.stdout + raw.stderr;
      return {
        ...raw,
        output,
        success: raw.exitCode === 0,
        durationMs: Date.now() - startTime
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
