/**
 * Segment Types
 * Intermediate segment shapes produced by the segmenter and the collapser
 */

/** How a scriptlet's body is to be turned into program code */
export type ScriptletKind = 'plain' | 'expression' | 'include';

/** Segment as emitted by the segmenter, before shorthand lowering */
export interface RawSegment {
  readonly kind: 'literal' | ScriptletKind;
  readonly sourceText: string;
  readonly languageTag: string;
  readonly startLine: number;
  readonly startColumn: number;
}

/** Segment after lowering: either literal text or program source */
export interface SegmentData {
  readonly sourceText: string;
  readonly isProgram: boolean;
  readonly languageTag: string;
  readonly startLine: number;
  readonly startColumn: number;
}
