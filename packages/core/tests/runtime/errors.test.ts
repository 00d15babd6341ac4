/**
 * Weft Runtime Tests: Error Taxonomy
 * Registry lookups, template rendering, error classes and frames
 */

import { describe, expect, it } from 'vitest';

import {
  DocumentError,
  DocumentNotFoundError,
  ERROR_REGISTRY,
  EntryPointNotFoundError,
  ExecutionError,
  ParsingError,
  WeftError,
  createError,
  getStack,
  renderMessage,
} from 'weft';

describe('Weft Runtime: Error Taxonomy', () => {
  describe('registry', () => {
    it('holds every error definition once', () => {
      const ids = [...ERROR_REGISTRY.entries()].map(([id]) => id);
      expect(ids).toEqual([
        'WEFT-P001',
        'WEFT-P002',
        'WEFT-P003',
        'WEFT-E001',
        'WEFT-E002',
        'WEFT-E003',
        'WEFT-E004',
        'WEFT-D001',
        'WEFT-D002',
      ]);
      expect(ERROR_REGISTRY.size).toBe(9);
    });

    it('describes each error with a category and template', () => {
      const definition = ERROR_REGISTRY.get('WEFT-P002');
      expect(definition?.category).toBe('parse');
      expect(definition?.messageTemplate).toBe('Adapter not found: {tag}');
      expect(ERROR_REGISTRY.has('WEFT-X999')).toBe(false);
    });
  });

  describe('renderMessage', () => {
    it('replaces placeholders with context values', () => {
      expect(renderMessage('Adapter not found: {tag}', { tag: 'elvish' })).toBe(
        'Adapter not found: elvish'
      );
    });

    it('renders missing values as empty strings', () => {
      expect(renderMessage('Hello {name}!', {})).toBe('Hello !');
    });

    it('coerces non-string values', () => {
      expect(renderMessage('{count} items', { count: 3 })).toBe('3 items');
    });

    it('returns templates with an unclosed brace unchanged', () => {
      expect(renderMessage('broken {name', { name: 'x' })).toBe(
        'broken {name'
      );
    });
  });

  describe('error classes', () => {
    it('rejects unknown error ids', () => {
      expect(
        () => new WeftError({ errorId: 'WEFT-X999', message: 'nope' })
      ).toThrow('Unknown error ID: WEFT-X999');
    });

    it('rejects ids of another category', () => {
      expect(() => new ParsingError('WEFT-E001', 'wrong')).toThrow(
        'Expected parse error ID, got: WEFT-E001'
      );
    });

    it('keeps the cause', () => {
      const cause = new Error('root');
      const error = new ExecutionError(
        'WEFT-E001',
        'root',
        undefined,
        { reason: 'root' },
        cause
      );
      expect(error.cause).toBe(cause);
    });

    it('collects frames innermost first', () => {
      const error = new ExecutionError('WEFT-E001', 'boom', {
        documentName: 'inner',
        line: 3,
        column: 2,
      });
      error.pushFrame({ documentName: 'outer', line: 1, column: 1 });
      expect(getStack(error)).toEqual([
        { documentName: 'inner', line: 3, column: 2 },
        { documentName: 'outer', line: 1, column: 1 },
      ]);
      expect(error.toData()).toEqual({
        errorId: 'WEFT-E001',
        message: 'boom',
        frames: [
          { documentName: 'inner', line: 3, column: 2 },
          { documentName: 'outer', line: 1, column: 1 },
        ],
        context: undefined,
      });
    });

    it('returns no frames for foreign errors', () => {
      expect(getStack(new Error('plain'))).toEqual([]);
      expect(getStack('text')).toEqual([]);
    });

    it('formats with a host formatter', () => {
      const error = new DocumentNotFoundError('page');
      expect(error.format()).toBe('Document not found: page');
      expect(error.format((data) => `${data.errorId}: ${data.message}`)).toBe(
        'WEFT-D001: Document not found: page'
      );
    });
  });

  describe('createError', () => {
    it('creates the class of the definition category', () => {
      const parsing = createError(
        'WEFT-P002',
        { tag: 'elvish' },
        { documentName: 'page', line: 3, column: 1 }
      );
      expect(parsing).toBeInstanceOf(ParsingError);
      expect(parsing.message).toBe('Adapter not found: elvish');
      expect(parsing.frames).toEqual([
        { documentName: 'page', line: 3, column: 1 },
      ]);

      expect(createError('WEFT-E002', { name: 'page' })).toBeInstanceOf(
        ExecutionError
      );
      expect(
        createError('WEFT-D002', { name: 'page', reason: 'EACCES' })
      ).toBeInstanceOf(DocumentError);
    });

    it('creates the dedicated classes', () => {
      const entry = createError('WEFT-E003', { entryPoint: 'main' });
      expect(entry).toBeInstanceOf(EntryPointNotFoundError);
      expect(entry.message).toBe('No such entry point: main');

      const missing = createError('WEFT-D001', { name: 'page' });
      expect(missing).toBeInstanceOf(DocumentNotFoundError);
      expect(missing.message).toBe('Document not found: page');
    });

    it('throws for unknown ids', () => {
      expect(() => createError('WEFT-X999', {})).toThrow(
        'Unknown error ID: WEFT-X999'
      );
    });
  });
});
