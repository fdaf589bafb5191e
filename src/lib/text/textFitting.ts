// =============================================================================
// TEXT FITTING ENGINE
// =============================================================================
// Decides font size and line breaks for a text element with a max width.
// Pure: returns the fitted layout and a fresh AdjustmentResult, never touches
// the element.
//
//   shrink    largest size whose single line fits; ellipsis at the minimum
//   wrap      greedy word wrap, smaller sizes when the block is too tall
//   truncate  original size, trailing characters replaced by an ellipsis
//   auto      shrink for short text, wrap for long text
// =============================================================================

import { DEFAULT_RENDER_CONFIG, type RenderConfig } from '@/lib/config';
import type { AdjustmentResult, AppliedPolicy, TextElement } from '@/lib/card/types';
import { measureText, shrinkToFit, type WidthMeasurer } from '@/lib/text-measurement-utils';

export interface FitContext {
  measure: WidthMeasurer;
  /** Height the text block may occupy, points (usually the panel height) */
  availableHeight?: number;
  config?: Pick<RenderConfig, 'pointsPerInch' | 'lineHeightFactor' | 'autoShrinkMaxChars' | 'ellipsis'>;
}

export interface FittedText {
  fontSize: number;
  lines: string[];
  adjustment: AdjustmentResult;
}

function splitWords(content: string): string[] {
  return content.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Policy `auto` resolves to: shrink below the length threshold, wrap when a
 * width is set, else shrink
 */
export function selectAutoPolicy(content: string, hasWidth: boolean, shortTextThreshold: number = 30): AppliedPolicy {
  if (content.length < shortTextThreshold) return 'shrink';
  return hasWidth ? 'wrap' : 'shrink';
}

/**
 * Greedy word wrap. A word wider than `maxWidth` gets a line of its own.
 * Stops after `maxLines` lines.
 */
export function wrapText(
  measure: WidthMeasurer,
  content: string,
  fontSize: number,
  maxWidth: number,
  maxLines?: number
): string[] {
  const lines: string[] = [];
  let current: string[] = [];

  for (const word of splitWords(content)) {
    const candidate = [...current, word].join(' ');
    if (measure(candidate, fontSize) <= maxWidth) {
      current.push(word);
    } else if (current.length > 0) {
      lines.push(current.join(' '));
      current = [word];
    } else {
      lines.push(word);
    }

    if (maxLines !== undefined && lines.length >= maxLines) {
      current = [];
      break;
    }
  }

  if (current.length > 0) lines.push(current.join(' '));
  return maxLines !== undefined ? lines.slice(0, maxLines) : lines;
}

/**
 * Cut trailing characters until the text plus ellipsis fits. Text that
 * already fits is returned unchanged.
 */
export function truncateWithEllipsis(
  measure: WidthMeasurer,
  content: string,
  fontSize: number,
  maxWidth: number,
  ellipsis: string = '...'
): string {
  if (measure(content, fontSize) <= maxWidth) return content;

  const available = maxWidth - measure(ellipsis, fontSize);
  let truncated = content;
  while (truncated.length > 0 && measure(truncated, fontSize) > available) {
    truncated = truncated.slice(0, -1);
  }
  return truncated.trimEnd() + ellipsis;
}

function countWords(lines: readonly string[]): number {
  return lines.reduce((total, line) => total + splitWords(line).length, 0);
}

/**
 * Fit a text element. Without a width the content is returned as one line at
 * its declared size.
 */
export function fitText(element: TextElement, context: FitContext): FittedText {
  const config = context.config ?? DEFAULT_RENDER_CONFIG;
  const { measure, availableHeight } = context;
  const originalSize = element.fontSize;
  const minSize = Math.min(element.minFontSize, originalSize);
  const policy =
    element.overflow === 'auto'
      ? selectAutoPolicy(element.content, element.width !== undefined, config.autoShrinkMaxChars)
      : element.overflow;

  const result = (fontSize: number, lines: string[], truncated: boolean): FittedText => ({
    fontSize,
    lines,
    adjustment: {
      wasAdjusted: fontSize !== originalSize || truncated || lines.length > 1,
      policyApplied: policy,
      originalFontSize: originalSize,
      finalFontSize: fontSize,
      linesUsed: lines.length,
      contentTruncated: truncated,
    },
  });

  if (element.width === undefined) {
    return result(originalSize, [element.content], false);
  }

  const maxWidth = element.width * config.pointsPerInch;

  switch (policy) {
    case 'shrink': {
      const size = shrinkToFit(measure, element.content, originalSize, maxWidth, minSize);
      if (size === minSize && !measureText(measure, element.content, size, maxWidth).fitsWithinBounds) {
        const content = truncateWithEllipsis(measure, element.content, size, maxWidth, config.ellipsis);
        return result(size, [content], content !== element.content);
      }
      return result(size, [element.content], false);
    }

    case 'wrap': {
      const totalWords = splitWords(element.content).length;
      const wrapAt = (size: number) => wrapText(measure, element.content, size, maxWidth, element.maxLines);
      const fits = (lines: string[], size: number) =>
        measureText(measure, lines, size, maxWidth, availableHeight, config.lineHeightFactor).fitsWithinBounds;

      let size = originalSize;
      let lines = wrapAt(size);

      if (availableHeight !== undefined && !fits(lines, size) && size > minSize) {
        let low = minSize;
        let high = originalSize;
        let best: { size: number; lines: string[] } | undefined;

        while (low <= high) {
          const mid = Math.floor((low + high) / 2);
          const candidate = wrapAt(mid);
          if (fits(candidate, mid)) {
            best = { size: mid, lines: candidate };
            low = mid + 1;
          } else {
            high = mid - 1;
          }
        }

        size = best?.size ?? minSize;
        lines = best?.lines ?? wrapAt(minSize);
      }

      return result(size, lines, countWords(lines) < totalWords);
    }

    case 'truncate': {
      const content = truncateWithEllipsis(measure, element.content, originalSize, maxWidth, config.ellipsis);
      return result(originalSize, [content], content !== element.content);
    }

    default: {
      const unknown: never = policy;
      throw new Error(`Unknown overflow policy: ${String(unknown)}`);
    }
  }
}
