/**
 * Input units: source files, standard input and literal names.
 *
 * @packageDocumentation
 */

import { extractNameLines, extractTestNames, namesToTests } from '../extract/index.js';
import type { ExtractedTest } from '../extract/index.js';
import type { InputMode } from '../config/index.js';
import { safeReadTextFile } from '../utils/safe-fs.js';

/** Input argument that stands for standard input. */
export const STDIN_INPUT = '-';

/**
 * Error thrown when a source file or standard input cannot be read.
 */
export class SourceReadError extends Error {
  /** The path as given on the command line, or `<stdin>`. */
  public readonly path: string;
  /** Why the read failed. */
  public readonly reason: string;
  public override readonly cause: unknown;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`cannot read '${path}': ${reason}`);
    this.name = 'SourceReadError';
    this.path = path;
    this.reason = reason;
    this.cause = cause;
  }
}

/**
 * Where the tests of one input unit come from.
 */
export type UnitSource =
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'stdin' }
  | { readonly kind: 'names'; readonly names: readonly string[] };

/**
 * Groups positional inputs into units.
 *
 * In file mode each path is a unit. In name mode consecutive literal names
 * form one unit. `-` is always a unit of its own, and no inputs at all means
 * standard input.
 *
 * @param inputs - Positional inputs in order.
 * @param mode - How inputs other than `-` are interpreted.
 */
export function planUnits(inputs: readonly string[], mode: InputMode): UnitSource[] {
  if (inputs.length === 0) {
    return [{ kind: 'stdin' }];
  }

  const units: UnitSource[] = [];
  let names: string[] = [];
  const flushNames = (): void => {
    if (names.length > 0) {
      units.push({ kind: 'names', names });
      names = [];
    }
  };

  for (const input of inputs) {
    if (input === STDIN_INPUT) {
      flushNames();
      units.push({ kind: 'stdin' });
    } else if (mode === 'name') {
      names.push(input);
    } else {
      units.push({ kind: 'file', path: input });
    }
  }
  flushNames();

  return units;
}

/**
 * Label used for a unit in log entries.
 */
export function unitLabel(unit: UnitSource): string {
  switch (unit.kind) {
    case 'file':
      return unit.path;
    case 'stdin':
      return '<stdin>';
    case 'names':
      return '<names>';
  }
}

/**
 * Reads the tests of one unit.
 *
 * @param unit - The unit to read.
 * @param mode - Whether standard input holds source text or one name per line.
 * @param readStdin - Reads all of standard input.
 * @returns Tests in input order.
 * @throws SourceReadError if a source file or standard input cannot be read.
 */
export async function loadUnit(
  unit: UnitSource,
  mode: InputMode,
  readStdin: () => Promise<string>
): Promise<ExtractedTest[]> {
  switch (unit.kind) {
    case 'names':
      return namesToTests(unit.names);
    case 'stdin': {
      let text: string;
      try {
        text = await readStdin();
      } catch (error) {
        throw new SourceReadError(unitLabel(unit), error);
      }
      return mode === 'name' ? extractNameLines(text) : extractTestNames(text);
    }
    case 'file': {
      let source: string;
      try {
        source = await safeReadTextFile(unit.path);
      } catch (error) {
        throw new SourceReadError(unit.path, error);
      }
      return extractTestNames(source);
    }
  }
}
