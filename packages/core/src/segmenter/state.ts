/**
 * Scanner State
 * Tracks position, line and column while the segmenter walks a document
 */

import type { SourceLocation } from '../source-location.js';

export interface ScannerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
}

export function createScannerState(source: string): ScannerState {
  return {
    source,
    pos: 0,
    line: 1,
    column: 1,
  };
}

export function currentLocation(state: ScannerState): SourceLocation {
  return {
    line: state.line,
    column: state.column,
    offset: state.pos,
  };
}

export function advance(state: ScannerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Advance until pos reaches offset, counting every newline passed */
export function advanceTo(state: ScannerState, offset: number): void {
  while (state.pos < offset && !isAtEnd(state)) {
    advance(state);
  }
}

export function isAtEnd(state: ScannerState): boolean {
  return state.pos >= state.source.length;
}
