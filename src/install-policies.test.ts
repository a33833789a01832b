import { describe, expect, it } from 'vitest';
import {
  BaseInstallPolicy,
  InstallPolicyRegistry,
  PKG_LIST_COMMAND,
  PipInstallPolicy,
  UvInstallPolicy
} from './install-policies';

describe('PipInstallPolicy', () => {
  const policy = new PipInstallPolicy();

  it('builds install and uninstall commands', () => {
    expect(policy.installCommand('numpy')).toBe('pip install numpy');
    expect(policy.uninstallCommand('numpy')).toBe('pip uninstall -y numpy');
    expect(policy.installCommand('bad name; rm -rf /')).toBe("pip install 'bad name; rm -rf /'");
  });

  it('parses pip list output', () => {
    const output = ['Package    Version', '---------- -------', 'NumPy      1.26.4', 'requests   2.32.3', ''].join('\n');
    expect(policy.parsePackages(output)).toEqual(['numpy', 'requests']);
  });
});

describe('UvInstallPolicy', () => {
  const policy = new UvInstallPolicy();

  it('builds install and uninstall commands', () => {
    expect(policy.installCommand('pandas')).toBe('uv pip install pandas');
    expect(policy.uninstallCommand('pandas')).toBe('uv pip uninstall pandas');
    expect(policy.listCommand()).toBe('uv pip list --format=json -q');
  });

  it('parses the JSON package list', () => {
    const output = JSON.stringify([
      { name: 'pandas', version: '2.2.2' },
      { name: 'numpy', version: '1.26.4' }
    ]);
    expect(policy.parsePackages(output)).toEqual(['pandas', 'numpy']);
  });

  it('treats empty output as no packages', () => {
    expect(policy.parsePackages('  \n')).toEqual([]);
  });

  it('rejects output that is not a package list', () => {
    expect(() => policy.parsePackages('{"name": "pandas"}')).toThrow();
  });
});

describe('BaseInstallPolicy', () => {
  class EchoPolicy extends BaseInstallPolicy {
    readonly name = 'echo';

    installCommand(pkg: string): string {
      return `echo install ${pkg}`;
    }

    uninstallCommand(pkg: string): string {
      return `echo uninstall ${pkg}`;
    }
  }

  it('lists modules through the interpreter and skips private entries', () => {
    const policy = new EchoPolicy();
    expect(policy.listCommand()).toBe(PKG_LIST_COMMAND);
    expect(policy.parsePackages('numpy\n_distutils_hack\nscript_abc\n  yaml  \n\n')).toEqual(['numpy', 'yaml']);
  });
});

describe('InstallPolicyRegistry', () => {
  it('provides pip and uv', () => {
    expect(InstallPolicyRegistry.names()).toEqual(expect.arrayContaining(['pip', 'uv']));
    expect(InstallPolicyRegistry.get('pip')).toBeInstanceOf(PipInstallPolicy);
    expect(InstallPolicyRegistry.get('uv')).toBeInstanceOf(UvInstallPolicy);
    expect(InstallPolicyRegistry.get('conda')).toBeUndefined();
  });
});
