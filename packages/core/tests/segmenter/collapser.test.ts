/**
 * Weft Segmenter Tests: Lowering and Collapsing
 */

import { describe, expect, it } from 'vitest';

import {
  Executable,
  ExecutionContext,
  HandlebarsAdapter,
  JavaScriptAdapter,
  LanguageRegistry,
  collapseSegments,
  foldLiterals,
  lowerSegments,
  mergeAdjacent,
  segmentDocument,
  StringWriter,
  type SegmentData,
} from 'weft';

import { RecordingAdapter } from '../helpers/adapters.js';

const registry = new LanguageRegistry([
  new JavaScriptAdapter(),
  new RecordingAdapter(),
]);
const owner = new Executable({
  documentName: 'owner',
  sourceCode: '',
  registry,
  defaultLanguageTag: 'js',
});

function data(
  sourceText: string,
  isProgram: boolean,
  languageTag: string,
  startColumn = 1
): SegmentData {
  return { sourceText, isProgram, languageTag, startLine: 1, startColumn };
}

describe('Weft Segmenter: Lowering and Collapsing', () => {
  describe('lowerSegments', () => {
    it('turns an expression into an output statement', () => {
      const { segments } = segmentDocument('Hello <%=js 2+2%> World', {
        documentName: 'doc',
        defaultLanguageTag: 'js',
      });
      expect(lowerSegments(segments, registry, owner)).toEqual([
        data('Hello ', false, 'js'),
        data('print(2+2);', true, 'js', 7),
        data(' World', false, 'js', 18),
      ]);
    });

    it('turns an include into a call on the exposed service', () => {
      const { segments } = segmentDocument("<%&js 'footer'%>", {
        documentName: 'doc',
        defaultLanguageTag: 'js',
      });
      expect(lowerSegments(segments, registry, owner)).toEqual([
        data("await executable.include('footer');", true, 'js'),
      ]);
    });

    it('keeps the text of segments without an adapter', () => {
      const { segments } = segmentDocument('<%=elvish x%>', {
        documentName: 'doc',
        defaultLanguageTag: 'js',
      });
      expect(lowerSegments(segments, registry, owner)).toEqual([
        data('x', true, 'elvish'),
      ]);
    });
  });

  describe('mergeAdjacent', () => {
    it('merges neighbours of the same kind and tag', () => {
      const merged = mergeAdjacent([
        data('a', false, 'js'),
        data('b', false, 'js', 2),
        data('x;', true, 'js', 3),
        data('y;', true, 'js', 5),
        data('z', true, 'py', 7),
      ]);
      expect(merged).toEqual([
        data('ab', false, 'js'),
        data('x;y;', true, 'js', 3),
        data('z', true, 'py', 7),
      ]);
    });
  });

  describe('foldLiterals', () => {
    it('folds literals into the preceding program of the same tag', () => {
      const folded = foldLiterals(
        [
          data('A', false, 'py'),
          data('p;', true, 'py', 2),
          data('B', false, 'py', 8),
          data('q;', true, 'py', 9),
        ],
        registry,
        owner
      );
      expect(folded).toEqual([
        data('A', false, 'py'),
        data('p;echo "B";q;', true, 'py', 2),
      ]);
    });

    it('leaves segments alone when the tag has no adapter', () => {
      const segments = [data('x', true, 'elvish'), data('y', false, 'elvish')];
      expect(foldLiterals(segments, registry, owner)).toEqual(segments);
    });

    it('does not fold across different tags', () => {
      const segments = [data('x', true, 'js'), data('y', false, 'py')];
      expect(foldLiterals(segments, registry, owner)).toEqual(segments);
    });
  });

  describe('collapseSegments', () => {
    it('reduces a text document to a leading literal and one program', () => {
      const { segments } = segmentDocument('Hello <%=js 2+2%> World', {
        documentName: 'doc',
        defaultLanguageTag: 'js',
      });
      const collapsed = collapseSegments(
        lowerSegments(segments, registry, owner),
        registry,
        owner
      );
      expect(collapsed).toEqual([
        data('Hello ', false, 'js'),
        data('print(2+2);print(" World");', true, 'js', 7),
      ]);
    });
  });

  describe('output preservation', () => {
    const outputRegistry = new LanguageRegistry([
      new JavaScriptAdapter(),
      new HandlebarsAdapter(),
    ]);

    function lowered(sourceCode: string, tag: string): {
      segments: SegmentData[];
      executable: Executable;
    } {
      const executable = new Executable({
        documentName: 'doc',
        sourceCode: '',
        registry: outputRegistry,
        defaultLanguageTag: tag,
      });
      const { segments } = segmentDocument(sourceCode, {
        documentName: 'doc',
        defaultLanguageTag: tag,
      });
      return {
        segments: lowerSegments(segments, outputRegistry, executable),
        executable,
      };
    }

    async function output(
      segments: readonly SegmentData[],
      executable: Executable,
      variables: Record<string, unknown>
    ): Promise<string> {
      const writer = new StringWriter();
      const context = new ExecutionContext({
        writer,
        exposedVariables: variables,
      });
      for (const segment of segments) {
        const adapter = outputRegistry.getAdapter(segment.languageTag);
        if (!segment.isProgram || !adapter) {
          writer.write(segment.sourceText);
          continue;
        }
        await adapter
          .createProgram(segment.sourceText, {
            executable,
            startLine: segment.startLine,
            startColumn: segment.startColumn,
          })
          .execute(context);
      }
      return writer.toString();
    }

    it('writes the same JavaScript output with literals folded', async () => {
      const { segments, executable } = lowered(
        'A "q" \\ <%= x %> \\n{{x}} <% print(x + 1); %> C:\\',
        'js'
      );
      const unfolded = mergeAdjacent(segments);
      const folded = foldLiterals(unfolded, outputRegistry, executable);
      expect(unfolded).toHaveLength(5);
      expect(folded).toHaveLength(2);

      const expected = 'A "q" \\ 1 \\n{{x}} 2 C:\\';
      expect(await output(unfolded, executable, { x: 1 })).toBe(expected);
      expect(await output(folded, executable, { x: 1 })).toBe(expected);
    });

    it('writes the same Handlebars output with literals folded', async () => {
      const { segments, executable } = lowered(
        '<%= x %> and \\{{x}} C:\\<%= x %> {{{y}}} end\\',
        'hbs'
      );
      const unfolded = mergeAdjacent(segments);
      const folded = foldLiterals(unfolded, outputRegistry, executable);
      expect(unfolded).toHaveLength(4);
      expect(folded).toHaveLength(1);

      const variables = { x: 'X', y: 'Y' };
      const expected = 'X and \\{{x}} C:\\X {{{y}}} end\\';
      expect(await output(unfolded, executable, variables)).toBe(expected);
      expect(await output(folded, executable, variables)).toBe(expected);
    });
  });
});
