// =============================================================================
// PATH PARSER
// =============================================================================
// Tokenizes the SVG path subset into PathCommand records. No coordinate
// interpretation happens here (see ./pathGeometry).
//
//   M/L/T: 2   H/V: 1   C: 6   S/Q: 4   A: 7   Z: 0
//
// A command followed by several parameter groups yields one record per
// group; extra groups after M/m are line-tos (L/l).
// =============================================================================

import { PathParseError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import type { PathCommand, PathCommandLetter } from '@/lib/card/types';

const log = createLogger('PathParser');

export const PATH_PARAM_COUNTS: Record<PathCommandLetter, number> = {
  M: 2, m: 2,
  L: 2, l: 2,
  T: 2, t: 2,
  H: 1, h: 1,
  V: 1, v: 1,
  C: 6, c: 6,
  S: 4, s: 4,
  Q: 4, q: 4,
  A: 7, a: 7,
  Z: 0, z: 0,
};

const TOKEN_PATTERN = /[A-Za-z]|[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/g;

export function isPathCommandLetter(value: string): value is PathCommandLetter {
  return Object.prototype.hasOwnProperty.call(PATH_PARAM_COUNTS, value);
}

interface PendingCommand {
  letter: string;
  params: number[];
}

function emit(pending: PendingCommand, out: PathCommand[]): void {
  const { letter, params } = pending;

  if (!isPathCommandLetter(letter)) {
    log.warn(`Skipping unknown path command '${letter}'`);
    return;
  }

  const count = PATH_PARAM_COUNTS[letter];
  if (count === 0) {
    if (params.length > 0) {
      log.warn(`Ignoring ${params.length} parameter(s) after '${letter}'`);
    }
    out.push({ command: letter, params: [] });
    return;
  }

  if (params.length === 0 || params.length % count !== 0) {
    throw new PathParseError(
      `Command '${letter}' expects a multiple of ${count} parameters, got ${params.length}`
    );
  }

  for (let i = 0; i < params.length; i += count) {
    let command = letter;
    if (i > 0 && letter === 'M') command = 'L';
    if (i > 0 && letter === 'm') command = 'l';
    out.push({ command, params: params.slice(i, i + count) });
  }
}

/**
 * Parse path data into commands
 * @throws PathParseError on empty input, leading numbers or a bad parameter count
 */
export function parsePathData(pathData: string): PathCommand[] {
  if (pathData.trim().length === 0) {
    throw new PathParseError('Path data is empty');
  }

  const commands: PathCommand[] = [];
  let pending: PendingCommand | undefined;

  for (const match of pathData.matchAll(TOKEN_PATTERN)) {
    const token = match[0];
    if (/^[A-Za-z]$/.test(token)) {
      if (pending) emit(pending, commands);
      pending = { letter: token, params: [] };
      continue;
    }
    if (!pending) {
      throw new PathParseError(`Path data must start with a command, found '${token}'`);
    }
    pending.params.push(parseFloat(token));
  }

  if (pending) emit(pending, commands);

  if (commands.length === 0) {
    throw new PathParseError('Path data contains no drawable commands');
  }

  return commands;
}
