export const USAGE = 'Usage: allergen-scan <image> | --text "<label text>" [--profile a,b] [--threshold 0..1]';

export interface CliOptions {
  image?: string;
  text?: string;
  profile: string;
  threshold?: number;
}

export type ParsedArgs = { ok: true; options: CliOptions } | { ok: false; error: string };

function valueAfter(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

export function parseArgs(args: string[]): ParsedArgs {
  const flags = ['--text', '--profile', '--threshold'];
  for (const flag of flags) {
    if (args.includes(flag) && valueAfter(args, flag) === undefined) {
      return { ok: false, error: `Missing value for ${flag}` };
    }
  }

  const text = valueAfter(args, '--text');
  const profile = valueAfter(args, '--profile') ?? '';
  const thresholdRaw = valueAfter(args, '--threshold');

  const consumed = new Set<number>();
  for (const flag of flags) {
    const idx = args.indexOf(flag);
    if (idx >= 0) {
      consumed.add(idx);
      consumed.add(idx + 1);
    }
  }
  const positional = args.filter((arg, idx) => !consumed.has(idx));
  const unknown = positional.find((arg) => arg.startsWith('--'));
  if (unknown) {
    return { ok: false, error: `Unknown option ${unknown}` };
  }

  if ((text === undefined) === (positional.length === 0)) {
    return { ok: false, error: 'Give exactly one of an image path or --text' };
  }
  if (positional.length > 1) {
    return { ok: false, error: 'Only one image can be scanned at a time' };
  }

  let threshold: number | undefined;
  if (thresholdRaw !== undefined) {
    threshold = Number(thresholdRaw);
    if (!thresholdRaw.trim() || Number.isNaN(threshold) || threshold < 0 || threshold > 1) {
      return { ok: false, error: `Threshold must be a number between 0 and 1, got "${thresholdRaw}"` };
    }
  }

  return { ok: true, options: { image: positional[0], text, profile, threshold } };
}
