import AdmZip from 'adm-zip';
import { describe, expect, it, vi } from 'vitest';
import { HOME, InMemoryHost, fail, ok } from '../test/in-memory-host';
import { quietLogger } from '../test/runtime';
import { ConfigurationError, HostCommandError, PathSafetyError, SessionNotFoundError } from './errors';
import { EngineConfigInput } from './config';
import { ExecutionEngine } from './execution-engine';
import { OUTSIDE_ARTIFACT_DIRECTORY } from './path-safety';
import { RawCommandOutput } from './types';

function createEngine(host: InMemoryHost, config: EngineConfigInput = {}): Promise<ExecutionEngine> {
  return ExecutionEngine.create(host, { installPolicy: 'pip', verbosity: 'silent', ...config }, quietLogger());
}

describe('ExecutionEngine', () => {
  describe('create', () => {
    it('uses the home directory of the host as base directory', async () => {
      const host = new InMemoryHost();
      const engine = await createEngine(host);

      expect(host.commands.slice(0, 2)).toEqual([
        { command: 'echo "$HOME"', workdir: '/' },
        { command: 'pip list', workdir: HOME }
      ]);
      expect(await engine.createSession('s1')).toEqual({
        id: 's1',
        workdir: `${HOME}/s1`,
        sourcePath: `${HOME}/s1/src`,
        artifactPath: `${HOME}/s1/artifacts`
      });
    });

    it('prefers a configured base directory', async () => {
      const host = new InMemoryHost();
      const engine = await createEngine(host, { baseDir: '/srv/sandbox' });

      expect(host.commandsMatching('HOME')).toEqual([]);
      expect((await engine.createSession('s1')).workdir).toBe('/srv/sandbox/s1');
    });

    it('fails when the home directory cannot be read', async () => {
      const host = new InMemoryHost().on('echo', fail(1, 'sh: not found'));

      await expect(createEngine(host)).rejects.toBeInstanceOf(HostCommandError);
    });

    it('refuses cached dependencies outside the whitelist', async () => {
      const host = new InMemoryHost();

      await expect(
        createEngine(host, { dependencyWhitelist: ['pandas'], cachedDependencies: ['numpy'] })
      ).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('reports the packages present on the host', async () => {
      const host = new InMemoryHost().on('pip list', ok('requests 2.32.3\nnumpy 1.26.4\n'));
      const engine = await createEngine(host, { cachedDependencies: ['pandas'] });

      expect(engine.listPackages()).toEqual(['numpy', 'pandas', 'requests']);
    });
  });

  describe('executeCode', () => {
    it('runs hello world', async () => {
      const host = new InMemoryHost().on(/^python /, ok('Hello, World!\n'));
      const engine = await createEngine(host);
      const { id } = await engine.createSession();

      expect(await engine.executeCode(id, "print('Hello, World!')")).toBe('Hello, World!\n');
    });

    it('gives up on code that runs past the timeout', async () => {
      const host = new InMemoryHost().on(/^python /, () => new Promise<RawCommandOutput>(() => {}));
      const engine = await createEngine(host, { defaultTimeoutMs: 50 });
      const { id } = await engine.createSession();

      expect(await engine.executeCode(id, 'import time\ntime.sleep(2)')).toBe('Error: Execution timed out.');
    });

    it('refuses packages outside the whitelist', async () => {
      const host = new InMemoryHost();
      const engine = await createEngine(host, { dependencyWhitelist: ['pandas'] });
      const { id } = await engine.createSession();

      expect(await engine.executeCode(id, 'import numpy as np\nprint(np.zeros(3))')).toBe(
        'Dependency: numpy is not in the whitelist.'
      );
      expect(host.commandsMatching('pip install')).toEqual([]);
    });

    it('passes ignored unsafe functions to the policy check', async () => {
      const host = new InMemoryHost().on(/^python /, ok('3\n'));
      const engine = await createEngine(host);
      const { id } = await engine.createSession();
      const code = "with open('data.csv') as f:\n    print(len(f.read()))";

      expect(await engine.executeCode(id, code)).toBe('Unsafe function call: open');
      expect(await engine.executeCode(id, code, { ignoreUnsafeFunctions: ['open'] })).toBe('3\n');
    });

    it('rejects unknown sessions', async () => {
      const engine = await createEngine(new InMemoryHost());

      await expect(engine.executeCode('missing', 'print(1)')).rejects.toThrow(new SessionNotFoundError('missing'));
    });
  });

  describe('files', () => {
    it('uploads into the source directory', async () => {
      const host = new InMemoryHost();
      const engine = await createEngine(host);
      const { id } = await engine.createSession('s1');

      expect(await engine.uploadFile(id, 'data.csv', Buffer.from('a,b\n'))).toBe(`${HOME}/s1/src/data.csv`);
      expect(await engine.listSources(id)).toEqual([{ name: 'data.csv', size: 4 }]);
    });

    it('rejects traversal in upload names before writing anything', async () => {
      const host = new InMemoryHost();
      const engine = await createEngine(host);
      const { id } = await engine.createSession();

      await expect(engine.uploadFile(id, '../../etc/passwd', Buffer.from('root'))).rejects.toThrow(
        new PathSafetyError('Invalid filename: path separators and traversal attempts are not allowed')
      );
      expect(host.writes).toEqual([]);
    });

    it('downloads artifacts', async () => {
      const host = new InMemoryHost();
      const engine = await createEngine(host);
      const { id, artifactPath } = await engine.createSession();
      host.files.set(`${artifactPath}/result.txt`, Buffer.from('42'));

      expect((await engine.downloadFile(id, 'result.txt')).toString()).toBe('42');
      expect((await engine.downloadFile(id, `${artifactPath}/result.txt`)).toString()).toBe('42');
    });

    it('refuses downloads outside the artifact directory whether or not the file exists', async () => {
      const host = new InMemoryHost();
      const engine = await createEngine(host);
      const { id, sourcePath } = await engine.createSession();
      await engine.uploadFile(id, 'secret.py', Buffer.from('x = 1'));
      const getFile = vi.spyOn(host, 'getFile');

      for (const path of ['../src/secret.py', `${sourcePath}/secret.py`, '../src/missing.py', '/etc/passwd']) {
        await expect(engine.downloadFile(id, path)).rejects.toThrow(new PathSafetyError(OUTSIDE_ARTIFACT_DIRECTORY));
      }
      expect(getFile).not.toHaveBeenCalled();
    });

    it('archives the artifact directory', async () => {
      const host = new InMemoryHost();
      const engine = await createEngine(host);
      const { id, artifactPath } = await engine.createSession();
      host.files.set(`${artifactPath}/b.txt`, Buffer.from('BB'));
      host.files.set(`${artifactPath}/a.txt`, Buffer.from('A'));

      const archive = new AdmZip(await engine.archiveArtifacts(id));

      expect(archive.getEntries().map(entry => entry.entryName)).toEqual(['a.txt', 'b.txt']);
      expect(archive.readAsText('b.txt')).toBe('BB');
      expect(await engine.listArtifacts(id)).toEqual([
        { name: 'a.txt', size: 1 },
        { name: 'b.txt', size: 2 }
      ]);
    });
  });

  describe('sessions', () => {
    it('closes a session and forgets it', async () => {
      const host = new InMemoryHost();
      const engine = await createEngine(host);
      const { id, workdir } = await engine.createSession();

      await engine.closeSession(id);

      expect(host.removals).toEqual([workdir]);
      expect(engine.listSessions()).toEqual([]);
      expect(() => engine.getSessionInfo(id)).toThrow(new SessionNotFoundError(id));
      await expect(engine.closeSession(id)).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('lets a closed name be used again', async () => {
      const engine = await createEngine(new InMemoryHost());
      await engine.createSession('again');
      await engine.closeSession('again');

      expect((await engine.createSession('again')).id).toBe('again');
      expect(engine.listSessions()).toEqual(['again']);
    });

    it('closes everything on shutdown', async () => {
      const engine = await createEngine(new InMemoryHost());
      await engine.createSession('one');
      await engine.createSession('two');

      await engine.shutdown();

      expect(engine.listSessions()).toEqual([]);
    });
  });

  it('exposes the policy check', async () => {
    const engine = await createEngine(new InMemoryHost());

    expect(engine.checkCode('import subprocess')).toEqual({
      safe: false,
      message: 'Unsafe module import: subprocess'
    });
  });
});
