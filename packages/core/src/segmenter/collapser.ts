/**
 * Segment Collapser
 * Merges adjacent segments to reduce program count and adapter switches
 */

import type { LanguageRegistry } from '../language/registry.js';
import type { Executable } from '../runtime/executable.js';
import type { SegmentData } from './types.js';

function append(segment: SegmentData, sourceText: string): SegmentData {
  return { ...segment, sourceText: segment.sourceText + sourceText };
}

/**
 * Pass 1: merge neighbours of the same kind and language tag.
 * The earlier segment's location is kept.
 */
export function mergeAdjacent(
  segments: readonly SegmentData[]
): SegmentData[] {
  const merged: SegmentData[] = [];
  for (const segment of segments) {
    const last = merged.length - 1;
    const previous = merged[last];
    if (
      previous &&
      previous.isProgram === segment.isProgram &&
      previous.languageTag === segment.languageTag
    ) {
      merged[last] = append(previous, segment.sourceText);
    } else {
      merged.push(segment);
    }
  }
  return merged;
}

/**
 * Pass 2: fold literals into the program segment right before them.
 *
 * The literal is converted with the adapter's literal output transform.
 * Programs that then follow a program of the same tag are concatenated.
 * A literal with no preceding program (such as a leading literal) is
 * never converted.
 */
export function foldLiterals(
  segments: readonly SegmentData[],
  registry: LanguageRegistry,
  executable: Executable
): SegmentData[] {
  const folded: SegmentData[] = [];
  for (const segment of segments) {
    const last = folded.length - 1;
    const previous = folded[last];
    if (
      previous?.isProgram &&
      previous.languageTag === segment.languageTag
    ) {
      if (segment.isProgram) {
        folded[last] = append(previous, segment.sourceText);
        continue;
      }
      const adapter = registry.getAdapter(segment.languageTag);
      if (adapter) {
        folded[last] = append(
          previous,
          adapter.getSourceCodeForLiteralOutput(segment.sourceText, executable)
        );
        continue;
      }
    }
    folded.push(segment);
  }
  return folded;
}

/** Run both collapse passes */
export function collapseSegments(
  segments: readonly SegmentData[],
  registry: LanguageRegistry,
  executable: Executable
): SegmentData[] {
  return foldLiterals(mergeAdjacent(segments), registry, executable);
}
