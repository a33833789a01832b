const SAFE_ARG = /^[A-Za-z0-9_./=+,@:%-]+$/;

/** Quotes an argument for `sh -c` unless it is made only of inert characters. */
export function shellQuote(arg: string): string {
  if (arg !== '' && SAFE_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function shellJoin(args: string[]): string {
  return args.map(shellQuote).join(' ');
}
