// =============================================================================
// PATH INTERPRETATION
// =============================================================================
// Turns parsed commands into absolute move/line/curve/close segments in the
// path's own coordinate space. Shared by the Shape Renderer (svg_path shapes)
// and the Clipping Renderer (svg_path masks).
// =============================================================================

import { createLogger } from '@/lib/logger';
import type { PathCommand, Point } from '@/lib/card/types';
import type { PathSegment } from '@/lib/render/types';
import { parsePathData } from './pathParser';

const log = createLogger('PathGeometry');

/**
 * Degree-elevate a quadratic segment p0→q→p to cubic control points
 */
export function quadraticToCubic(p0: Point, q: Point, p: Point): { c1: Point; c2: Point } {
  return {
    c1: { x: p0.x + (2 / 3) * (q.x - p0.x), y: p0.y + (2 / 3) * (q.y - p0.y) },
    c2: { x: p.x + (2 / 3) * (q.x - p.x), y: p.y + (2 / 3) * (q.y - p.y) },
  };
}

function reflect(control: Point, about: Point): Point {
  return { x: 2 * about.x - control.x, y: 2 * about.y - control.y };
}

/**
 * Interpret commands into absolute segments.
 *
 * Relative commands offset from the current point. S/T reflect the previous
 * control point only when the previous command was a cubic (C/S) or
 * quadratic (Q/T) respectively; otherwise the current point is used.
 * Arcs are approximated by a straight line to their endpoint.
 */
export function interpretPath(commands: readonly PathCommand[]): PathSegment[] {
  const segments: PathSegment[] = [];
  let current: Point = { x: 0, y: 0 };
  let subpathStart: Point = { x: 0, y: 0 };
  let lastCubicControl: Point | undefined;
  let lastQuadControl: Point | undefined;
  let hasMove = false;

  const ensureMove = () => {
    if (!hasMove) {
      segments.push({ op: 'move', x: current.x, y: current.y });
      hasMove = true;
    }
  };

  const cubic = (c1: Point, c2: Point, end: Point) => {
    ensureMove();
    segments.push({ op: 'curve', x1: c1.x, y1: c1.y, x2: c2.x, y2: c2.y, x: end.x, y: end.y });
    current = end;
  };

  const line = (end: Point) => {
    ensureMove();
    segments.push({ op: 'line', x: end.x, y: end.y });
    current = end;
  };

  for (const { command, params: p } of commands) {
    const relative = command === command.toLowerCase();
    const at = (x: number, y: number): Point =>
      relative ? { x: current.x + x, y: current.y + y } : { x, y };

    let nextCubicControl: Point | undefined;
    let nextQuadControl: Point | undefined;

    switch (command) {
      case 'M':
      case 'm': {
        current = at(p[0], p[1]);
        subpathStart = current;
        segments.push({ op: 'move', x: current.x, y: current.y });
        hasMove = true;
        break;
      }
      case 'L':
      case 'l':
        line(at(p[0], p[1]));
        break;
      case 'H':
      case 'h':
        line({ x: relative ? current.x + p[0] : p[0], y: current.y });
        break;
      case 'V':
      case 'v':
        line({ x: current.x, y: relative ? current.y + p[0] : p[0] });
        break;
      case 'C':
      case 'c': {
        const c1 = at(p[0], p[1]);
        const c2 = at(p[2], p[3]);
        cubic(c1, c2, at(p[4], p[5]));
        nextCubicControl = c2;
        break;
      }
      case 'S':
      case 's': {
        const c1 = lastCubicControl ? reflect(lastCubicControl, current) : current;
        const c2 = at(p[0], p[1]);
        cubic(c1, c2, at(p[2], p[3]));
        nextCubicControl = c2;
        break;
      }
      case 'Q':
      case 'q': {
        const q = at(p[0], p[1]);
        const end = at(p[2], p[3]);
        const { c1, c2 } = quadraticToCubic(current, q, end);
        cubic(c1, c2, end);
        nextQuadControl = q;
        break;
      }
      case 'T':
      case 't': {
        const q = lastQuadControl ? reflect(lastQuadControl, current) : current;
        const end = at(p[0], p[1]);
        const { c1, c2 } = quadraticToCubic(current, q, end);
        cubic(c1, c2, end);
        nextQuadControl = q;
        break;
      }
      case 'A':
      case 'a': {
        const end = at(p[5], p[6]);
        log.debug(`Arc approximated by a line to (${end.x}, ${end.y})`);
        line(end);
        break;
      }
      case 'Z':
      case 'z':
        if (hasMove) segments.push({ op: 'close' });
        current = subpathStart;
        break;
      default: {
        const unreachable: never = command;
        throw new Error(`Unhandled path command ${String(unreachable)}`);
      }
    }

    lastCubicControl = nextCubicControl;
    lastQuadControl = nextQuadControl;
  }

  return segments;
}

/**
 * Parse and interpret in one step
 * @throws PathParseError
 */
export function pathDataToSegments(pathData: string): PathSegment[] {
  return interpretPath(parsePathData(pathData));
}
