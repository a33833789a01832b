import stdlibModules from './data/stdlib-modules.json';
import { PythonSource, topLevelName } from './python-syntax';

const STANDARD_MODULES: ReadonlySet<string> = new Set(stdlibModules);

export function isStandardModule(name: string): boolean {
  return STANDARD_MODULES.has(name);
}

/**
 * Third-party packages the code imports: the top-level segment of every
 * absolute import that the interpreter cannot resolve on its own. Relative
 * imports refer to the caller's own files and never count. The result is
 * sorted, so it does not depend on the order of the import statements.
 */
export function extractDependencies(code: string): string[] {
  const source = PythonSource.parse(code);
  if (source.syntaxError()) {
    return [];
  }

  const dependencies = new Set<string>();
  for (const record of source.imports()) {
    if (record.level > 0) continue;
    const modules = record.kind === 'from' ? (record.module ? [record.module] : []) : record.names;
    for (const module of modules) {
      const name = topLevelName(module);
      if (name && !isStandardModule(name)) {
        dependencies.add(name);
      }
    }
  }
  return Array.from(dependencies).sort();
}
