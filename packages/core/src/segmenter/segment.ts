/**
 * Segment
 * One resolved piece of an executable: literal text or a program
 */

import type { Program } from '../language/adapter.js';
import type { SegmentData } from './types.js';

export class Segment implements SegmentData {
  readonly sourceText: string;
  readonly isProgram: boolean;
  readonly languageTag: string;
  readonly startLine: number;
  readonly startColumn: number;
  /** Index within the owning executable's segment list */
  readonly position: number;
  private resolvedProgram: Program | undefined;

  constructor(data: SegmentData, position: number) {
    this.sourceText = data.sourceText;
    this.isProgram = data.isProgram;
    this.languageTag = data.languageTag;
    this.startLine = data.startLine;
    this.startColumn = data.startColumn;
    this.position = position;
  }

  get program(): Program | undefined {
    return this.resolvedProgram;
  }

  /** Attach the resolved program. Allowed exactly once. */
  setProgram(program: Program): void {
    if (this.resolvedProgram !== undefined) {
      throw new Error(
        `Segment ${this.position} already has a resolved program`
      );
    }
    this.resolvedProgram = program;
  }
}
