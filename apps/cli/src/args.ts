export function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx >= args.length - 1) return undefined;
  return args[idx + 1];
}

/** Every value of a repeatable flag, in order: `--cap a --cap b` -> ['a', 'b']. */
export function getFlags(args: string[], flag: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length - 1; i++) {
    if (args[i] === flag) values.push(args[i + 1]);
  }
  return values;
}

export function getNumberFlag(args: string[], flag: string): number | undefined {
  const raw = getFlag(args, flag);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new RangeError(`${flag} expects a number, got "${raw}"`);
  return n;
}
