/**
 * CLI Shared Utilities Tests
 * Tests for verbose logging and help/version flag detection
 */

import { describe, expect, it } from 'vitest';
import {
  createVerboseObservability,
  detectHelpVersionFlag,
} from '../src/cli-shared.js';

describe('cli-shared', () => {
  describe('detectHelpVersionFlag', () => {
    it('detects help in any position', () => {
      expect(detectHelpVersionFlag(['page', '--help'])).toEqual({
        mode: 'help',
      });
      expect(detectHelpVersionFlag(['-h'])).toEqual({ mode: 'help' });
    });

    it('prefers help over version', () => {
      expect(detectHelpVersionFlag(['-v', '--help'])).toEqual({
        mode: 'help',
      });
    });

    it('detects version', () => {
      expect(detectHelpVersionFlag(['--version'])).toEqual({
        mode: 'version',
      });
    });

    it('returns null without either flag', () => {
      expect(detectHelpVersionFlag(['page', '--verbose'])).toBe(null);
    });
  });

  describe('createVerboseObservability', () => {
    it('logs one line per event', () => {
      const lines: string[] = [];
      const callbacks = createVerboseObservability((line) => lines.push(line));

      callbacks.onCompile?.({
        documentName: 'index',
        segmentCount: 3,
        durationMs: 1.5,
      });
      callbacks.onExecuteStart?.({ documentName: 'index', executionCount: 0 });
      callbacks.onExecuteEnd?.({ documentName: 'index', durationMs: 2 });
      callbacks.onError?.({
        documentName: 'index',
        error: new Error('boom'),
      });
      callbacks.onEvict?.({ documentName: 'index', reason: 'invalid' });

      expect(lines).toEqual([
        '[weft] compiled index (3 segments, 1.5ms)',
        '[weft] executing index (run 1)',
        '[weft] executed index in 2.0ms',
        '[weft] error in index: boom',
        '[weft] evicted index (invalid)',
      ]);
    });
  });
});
