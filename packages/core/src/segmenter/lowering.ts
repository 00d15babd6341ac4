/**
 * Shorthand Lowering
 * Turns expression and include scriptlets into program source
 */

import type { LanguageRegistry } from '../language/registry.js';
import type { Executable } from '../runtime/executable.js';
import type { RawSegment, SegmentData } from './types.js';

/**
 * Lower raw segments through the adapter of each segment's tag.
 * Segments whose tag has no adapter keep their text; resolution reports
 * the missing adapter later.
 */
export function lowerSegments(
  segments: readonly RawSegment[],
  registry: LanguageRegistry,
  executable: Executable
): SegmentData[] {
  return segments.map((segment) => {
    const { kind, ...location } = segment;
    if (kind === 'literal') {
      return { ...location, isProgram: false };
    }

    const adapter = registry.getAdapter(segment.languageTag);
    let sourceText = segment.sourceText;
    if (adapter && kind === 'expression') {
      sourceText = adapter.getSourceCodeForExpressionOutput(
        segment.sourceText,
        executable
      );
    } else if (adapter && kind === 'include') {
      sourceText = adapter.getSourceCodeForExpressionInclude(
        segment.sourceText,
        executable
      );
    }

    return { ...location, sourceText, isProgram: true };
  });
}
