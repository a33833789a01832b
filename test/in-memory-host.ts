import { posix } from 'path';
import { HostCommandError } from '../src/errors';
import { ExecutionHost, RawCommandOutput } from '../src/types';

export type CommandResponder = (command: string, workdir: string) => RawCommandOutput | Promise<RawCommandOutput>;

export interface RecordedCommand {
  command: string;
  workdir: string;
}

export const HOME = '/home/sandbox';

export function ok(stdout = '', stderr = ''): RawCommandOutput {
  return { exitCode: 0, stdout, stderr };
}

export function fail(exitCode = 1, stderr = ''): RawCommandOutput {
  return { exitCode, stdout: '', stderr };
}

/**
 * Execution host kept entirely in memory. Files live in a map keyed by
 * absolute path; commands are answered by scripted responders, most recent
 * registration first, with a few built-in defaults for the housekeeping
 * commands the engine issues.
 */
export class InMemoryHost implements ExecutionHost {
  readonly files = new Map<string, Buffer>();
  readonly commands: RecordedCommand[] = [];
  readonly writes: string[] = [];
  readonly removals: string[] = [];
  private responders: Array<{ match: string | RegExp; respond: CommandResponder }> = [];

  /** Answers every command containing `match` (or matching the pattern). */
  on(match: string | RegExp, respond: RawCommandOutput | CommandResponder): this {
    const responder: CommandResponder = typeof respond === 'function' ? respond : () => respond;
    this.responders.unshift({ match, respond: responder });
    return this;
  }

  commandsMatching(fragment: string): string[] {
    return this.commands.map(entry => entry.command).filter(command => command.includes(fragment));
  }

  async runCommand(command: string, workdir: string): Promise<RawCommandOutput> {
    this.commands.push({ command, workdir });
    for (const { match, respond } of this.responders) {
      const hit = typeof match === 'string' ? command.includes(match) : match.test(command);
      if (hit) return respond(command, workdir);
    }
    return this.defaultResponse(command, workdir);
  }

  async putFile(data: Buffer, destPath: string): Promise<void> {
    this.writes.push(destPath);
    this.files.set(destPath, Buffer.from(data));
  }

  async getFile(path: string): Promise<Buffer> {
    const data = this.files.get(path);
    if (!data) {
      throw new HostCommandError(`cat -- ${path}`, 1, `cat: ${path}: No such file or directory`);
    }
    return data;
  }

  async removeRecursive(path: string): Promise<void> {
    this.removals.push(path);
    for (const key of Array.from(this.files.keys())) {
      if (key === path || key.startsWith(`${path}/`)) {
        this.files.delete(key);
      }
    }
  }

  private defaultResponse(command: string, workdir: string): RawCommandOutput {
    if (command === 'echo "$HOME"') {
      return ok(`${HOME}\n`);
    }
    if (command.startsWith('find . -maxdepth 1 -type f')) {
      const listing = Array.from(this.files.entries())
        .filter(([path]) => posix.dirname(path) === workdir)
        .map(([path, data]) => `${posix.basename(path)}\t${data.length}\n`)
        .join('');
      return ok(listing);
    }
    return ok();
  }
}
