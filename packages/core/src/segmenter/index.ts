/**
 * Segmenter
 * Public API for document segmentation and collapsing
 */

export { DEFAULT_DELIMITERS, SHORTHAND, detectDelimiters } from './delimiters.js';
export type { DelimiterPair } from './delimiters.js';
export { segmentDocument } from './segmenter.js';
export type {
  InFlowRequest,
  SegmenterOptions,
  SegmenterResult,
} from './segmenter.js';
export { lowerSegments } from './lowering.js';
export { collapseSegments, foldLiterals, mergeAdjacent } from './collapser.js';
export { Segment } from './segment.js';
export type { RawSegment, ScriptletKind, SegmentData } from './types.js';
