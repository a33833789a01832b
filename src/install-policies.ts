import { z } from 'zod';
import { shellQuote } from './shell';

/**
 * How packages are installed, removed and listed for one packaging tool.
 * Implementations only build command strings and parse output; running the
 * commands is the dependency manager's job.
 */
export interface InstallPolicy {
  readonly name: string;
  /** Commands run once before the package list is read, e.g. to bootstrap the tool. */
  initCommands(): string[];
  installCommand(pkg: string): string;
  uninstallCommand(pkg: string): string;
  listCommand(): string;
  parsePackages(output: string): string[];
}

const PKG_LIST_PROGRAM = 'import pkgutil\\nfor p in pkgutil.iter_modules():\\n print(p.name)';

// Lists every importable top-level module using the interpreter itself
export const PKG_LIST_COMMAND = `python3 -c "exec('${PKG_LIST_PROGRAM}')"`;

export abstract class BaseInstallPolicy implements InstallPolicy {
  abstract readonly name: string;

  initCommands(): string[] {
    return [];
  }

  abstract installCommand(pkg: string): string;

  abstract uninstallCommand(pkg: string): string;

  listCommand(): string {
    return PKG_LIST_COMMAND;
  }

  parsePackages(output: string): string[] {
    return output
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line && !line.startsWith('_') && !line.startsWith('script_'));
  }
}

export class PipInstallPolicy extends BaseInstallPolicy {
  readonly name = 'pip';

  installCommand(pkg: string): string {
    return `pip install ${shellQuote(pkg)}`;
  }

  uninstallCommand(pkg: string): string {
    return `pip uninstall -y ${shellQuote(pkg)}`;
  }

  listCommand(): string {
    return 'pip list';
  }

  // `pip list` prints a "Package Version" header and a dashed rule before the rows
  parsePackages(output: string): string[] {
    const packages: string[] = [];
    for (const line of output.split(/\r?\n/)) {
      const [first, second] = line.trim().split(/\s+/);
      if (!first || !second) continue;
      if (first === 'Package' || first.startsWith('-')) continue;
      packages.push(first.toLowerCase());
    }
    return packages;
  }
}

const UvPackageListSchema = z.array(z.object({ name: z.string() }).passthrough());

export class UvInstallPolicy extends BaseInstallPolicy {
  readonly name = 'uv';

  installCommand(pkg: string): string {
    return `uv pip install ${shellQuote(pkg)}`;
  }

  uninstallCommand(pkg: string): string {
    return `uv pip uninstall ${shellQuote(pkg)}`;
  }

  listCommand(): string {
    return 'uv pip list --format=json -q';
  }

  parsePackages(output: string): string[] {
    const trimmed = output.trim();
    if (!trimmed) return [];
    return UvPackageListSchema.parse(JSON.parse(trimmed)).map(pkg => pkg.name);
  }
}

export class InstallPolicyRegistry {
  private static policies = new Map<string, () => InstallPolicy>([
    ['pip', () => new PipInstallPolicy()],
    ['uv', () => new UvInstallPolicy()]
  ]);

  static get(name: string): InstallPolicy | undefined {
    const factory = this.policies.get(name);
    return factory ? factory() : undefined;
  }

  static register(name: string, factory: () => InstallPolicy): void {
    this.policies.set(name, factory);
  }

  static names(): string[] {
    return Array.from(this.policies.keys());
  }
}
