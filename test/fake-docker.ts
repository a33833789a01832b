import type Docker from 'dockerode';
import { Duplex, PassThrough } from 'stream';
import { vi } from 'vitest';

export interface ScriptedExec {
  exitCode: number | null;
  stdout?: string | Buffer;
  stderr?: string;
}

export interface RecordedExec {
  options: Docker.ExecCreateOptions;
  stdin: Buffer;
}

interface Sink {
  write(chunk: Buffer): void;
}

const STDOUT = 1;
const STDERR = 2;

function frame(kind: number, data: string | Buffer): Buffer {
  return Buffer.concat([Buffer.from([kind]), typeof data === 'string' ? Buffer.from(data) : data]);
}

/**
 * Stands in for a dockerode container. Each exec answers from `script`; the
 * first byte of every chunk on the attached stream says whether it belongs to
 * stdout or stderr, which the fake modem splits again.
 */
export class FakeContainer {
  readonly execs: RecordedExec[] = [];
  readonly start = vi.fn(async () => undefined);
  readonly update = vi.fn(async (_options: object) => undefined);
  readonly remove = vi.fn(async (_options: object) => undefined);
  readonly inspect = vi.fn(async () => ({ State: { Running: true } }));
  readonly modem = {
    demuxStream: (stream: Duplex, stdout: Sink, stderr: Sink) => {
      stream.on('data', (chunk: Buffer) => {
        (chunk[0] === STDOUT ? stdout : stderr).write(chunk.subarray(1));
      });
    }
  };

  constructor(
    readonly id: string,
    private script: (cmd: string[]) => ScriptedExec = () => ({ exitCode: 0 })
  ) {}

  async exec(options: Docker.ExecCreateOptions) {
    const record: RecordedExec = { options, stdin: Buffer.alloc(0) };
    this.execs.push(record);
    const result = this.script(options.Cmd ?? []);

    return {
      start: async () => {
        const received: Buffer[] = [];
        const stream = new Duplex({
          read() {},
          write(chunk: Buffer, _encoding, callback) {
            received.push(chunk);
            callback();
          },
          final(callback) {
            record.stdin = Buffer.concat(received);
            this.push(null);
            callback();
          }
        });
        if (result.stdout) stream.push(frame(STDOUT, result.stdout));
        if (result.stderr) stream.push(frame(STDERR, result.stderr));
        if (!options.AttachStdin) stream.push(null);
        return stream;
      },
      inspect: async () => ({ ExitCode: result.exitCode })
    };
  }

  asContainer(): Docker.Container {
    return this as unknown as Docker.Container;
  }
}

/** Just enough of the Docker client for pulling, creating and looking up containers. */
export class FakeDocker {
  readonly containers = new Map<string, FakeContainer>();
  readonly pulled: string[] = [];
  readonly created: Docker.ContainerCreateOptions[] = [];
  readonly modem = {
    followProgress: (_stream: NodeJS.ReadableStream, onFinished: (error: Error | null) => void) => {
      onFinished(null);
    }
  };

  pull(image: string, _options: object, callback: (error: Error | null, stream: NodeJS.ReadableStream) => void) {
    this.pulled.push(image);
    const stream = new PassThrough();
    stream.end();
    callback(null, stream);
  }

  async createContainer(options: Docker.ContainerCreateOptions) {
    this.created.push(options);
    const container = new FakeContainer(`created-${this.created.length}`);
    this.containers.set(container.id, container);
    return container;
  }

  getContainer(name: string) {
    const container = this.containers.get(name);
    if (container) return container;
    const missing = new FakeContainer(name);
    missing.inspect.mockRejectedValue(Object.assign(new Error(`no such container: ${name}`), { statusCode: 404 }));
    return missing;
  }

  asDocker(): Docker {
    return this as unknown as Docker;
  }
}
