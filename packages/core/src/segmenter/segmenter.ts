/**
 * Segmenter
 * Splits a document into literal spans and scriptlets
 */

import { ParsingError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import { detectDelimiters, SHORTHAND } from './delimiters.js';
import type { DelimiterPair } from './delimiters.js';
import {
  advanceTo,
  createScannerState,
  currentLocation,
  isAtEnd,
} from './state.js';
import type { RawSegment, ScriptletKind } from './types.js';

// ============================================================
// TYPES
// ============================================================

/** A scriptlet body extracted into its own document */
export interface InFlowRequest {
  /** Body re-wrapped in delimiters: `<start><tag> <body><end>` */
  readonly sourceCode: string;
  readonly languageTag: string;
  readonly location: SourceLocation;
}

export interface SegmenterOptions {
  readonly documentName: string;
  readonly defaultLanguageTag: string;
  readonly delimiters?: readonly DelimiterPair[] | undefined;
  /**
   * Compiles and registers an in-flow sub-document, returning the name it
   * was registered under. Absent when there is no document source.
   */
  readonly inFlow?: ((request: InFlowRequest) => string) | undefined;
}

export interface SegmenterResult {
  readonly segments: RawSegment[];
  /** Style the document uses, undefined for pure literal text */
  readonly delimiters: DelimiterPair | undefined;
}

type Marker = ScriptletKind | 'inFlow';

interface ParsedScriptlet {
  readonly marker: Marker;
  readonly tag: string | undefined;
  readonly code: string;
}

// ============================================================
// SCRIPTLET PARSING
// ============================================================

function markerOf(body: string): Marker {
  switch (body[0]) {
    case SHORTHAND.expression:
      return 'expression';
    case SHORTHAND.include:
      return 'include';
    case SHORTHAND.inFlow:
      return 'inFlow';
    default:
      return 'plain';
  }
}

/**
 * Separate shorthand marker, language tag and code.
 *
 * The tag is the non-whitespace run directly after the marker, ended by the
 * first whitespace character (which is consumed). A body without any
 * whitespace has no tag. In-flow scriptlets skip whitespace before the tag.
 */
function parseScriptlet(body: string): ParsedScriptlet {
  const marker = markerOf(body);
  let rest = marker === 'plain' ? body : body.slice(1);
  if (marker === 'inFlow') {
    rest = rest.replace(/^\s+/, '');
  }

  if (rest.length === 0 || /^\s/.test(rest)) {
    return { marker, tag: undefined, code: rest };
  }

  const whitespace = /\s/.exec(rest);
  if (!whitespace) {
    return { marker, tag: undefined, code: rest };
  }

  return {
    marker,
    tag: rest.slice(0, whitespace.index),
    code: rest.slice(whitespace.index + 1),
  };
}

// ============================================================
// SEGMENTER
// ============================================================

/**
 * Segment a document into literal and scriptlet spans.
 *
 * Literal spans carry the language active at their position. A tagged
 * scriptlet switches the active language for following untagged ones,
 * except in-flow scriptlets whose tag only applies to the extracted
 * sub-document.
 *
 * @throws ParsingError WEFT-P001 when a scriptlet is never closed
 */
export function segmentDocument(
  source: string,
  options: SegmenterOptions
): SegmenterResult {
  const delimiters = detectDelimiters(source, options.delimiters);
  if (!delimiters) {
    const segments: RawSegment[] =
      source.length > 0
        ? [
            {
              kind: 'literal',
              sourceText: source,
              languageTag: options.defaultLanguageTag,
              startLine: 1,
              startColumn: 1,
            },
          ]
        : [];
    return { segments, delimiters: undefined };
  }

  const state = createScannerState(source);
  const segments: RawSegment[] = [];
  let activeTag = options.defaultLanguageTag;

  while (!isAtEnd(state)) {
    const start = source.indexOf(delimiters.start, state.pos);
    if (start === -1) {
      break;
    }

    if (start > state.pos) {
      const literalLocation = currentLocation(state);
      segments.push({
        kind: 'literal',
        sourceText: source.slice(state.pos, start),
        languageTag: activeTag,
        startLine: literalLocation.line,
        startColumn: literalLocation.column,
      });
      advanceTo(state, start);
    }

    const location = currentLocation(state);
    const bodyStart = start + delimiters.start.length;
    const end = source.indexOf(delimiters.end, bodyStart);
    if (end === -1) {
      throw new ParsingError(
        'WEFT-P001',
        `Scriptlet missing closing delimiter ${delimiters.end}`,
        {
          documentName: options.documentName,
          line: location.line,
          column: location.column,
        },
        { delimiter: delimiters.end }
      );
    }

    const { marker, tag, code } = parseScriptlet(
      source.slice(bodyStart, end)
    );
    advanceTo(state, end + delimiters.end.length);

    if (code.trim().length === 0) {
      if (tag !== undefined && marker !== 'inFlow') {
        activeTag = tag;
      }
      continue;
    }

    const startLine = location.line;
    const startColumn = location.column;

    if (marker === 'inFlow') {
      if (tag !== undefined && tag !== activeTag && options.inFlow) {
        const name = options.inFlow({
          sourceCode: `${delimiters.start}${tag} ${code.trim()}${delimiters.end}`,
          languageTag: tag,
          location,
        });
        segments.push({
          kind: 'include',
          sourceText: `'${name}'`,
          languageTag: activeTag,
          startLine,
          startColumn,
        });
      } else {
        segments.push({
          kind: 'plain',
          sourceText: code,
          languageTag: tag ?? activeTag,
          startLine,
          startColumn,
        });
      }
      continue;
    }

    if (tag !== undefined) {
      activeTag = tag;
    }
    segments.push({
      kind: marker,
      sourceText: code,
      languageTag: activeTag,
      startLine,
      startColumn,
    });
  }

  if (!isAtEnd(state)) {
    const location = currentLocation(state);
    segments.push({
      kind: 'literal',
      sourceText: source.slice(state.pos),
      languageTag: activeTag,
      startLine: location.line,
      startColumn: location.column,
    });
  }

  return { segments, delimiters };
}
