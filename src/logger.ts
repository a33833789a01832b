export type Verbosity = 'silent' | 'info' | 'debug';

export interface LevelState {
  verbosity: Verbosity;
}

/** Children share their parent's level, so `setVerbosity` on any of them applies to the whole tree. */
export class Logger {
  private scope: string;
  private state: LevelState;

  constructor(scope: string, verbosity: Verbosity | LevelState = 'info') {
    this.scope = scope;
    this.state = typeof verbosity === 'string' ? { verbosity } : verbosity;
  }

  private get verbosity(): Verbosity {
    return this.state.verbosity;
  }

  setVerbosity(level: Verbosity) {
    this.state.verbosity = level;
  }

  getVerbosity(): Verbosity {
    return this.state.verbosity;
  }

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.state);
  }

  debug(...args: unknown[]) {
    if (this.verbosity === 'debug') {
      console.log(`[${this.scope}]`, ...args);
    }
  }

  info(...args: unknown[]) {
    if (this.verbosity !== 'silent') {
      console.log(`[${this.scope}]`, ...args);
    }
  }

  warn(...args: unknown[]) {
    if (this.verbosity !== 'silent') {
      console.warn(`[${this.scope}]`, ...args);
    }
  }

  error(...args: unknown[]) {
    if (this.verbosity !== 'silent') {
      console.error(`[${this.scope}]`, ...args);
    }
  }

  // One entry per line of command output
  errorLines(header: string, output: string) {
    this.error(header);
    for (const line of output.split(/\r?\n/)) {
      if (line) this.error(line);
    }
  }
}
