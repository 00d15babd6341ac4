/**
 * Weft Language Tests: JavaScript Adapter
 */

import { describe, expect, it } from 'vitest';

import {
  DocumentService,
  Executable,
  ExecutionContext,
  InMemoryDocumentSource,
  JavaScriptAdapter,
  LanguageRegistry,
  StringWriter,
  wrapSource,
} from 'weft';

const javascript = new JavaScriptAdapter();
const registry = new LanguageRegistry([javascript]);

function compile(sourceCode: string): Executable {
  return new Executable({
    documentName: 'page',
    sourceCode,
    registry,
    defaultLanguageTag: 'js',
  });
}

async function render(
  sourceCode: string,
  context = new ExecutionContext()
): Promise<string> {
  const writer = new StringWriter();
  context.writer = writer;
  await compile(sourceCode).execute(context);
  return writer.toString();
}

describe('Weft Language: JavaScript Adapter', () => {
  const adapter = new JavaScriptAdapter();

  describe('info', () => {
    it('answers to javascript and js', () => {
      expect(adapter.info.tags).toEqual(['javascript', 'js']);
      expect(adapter.info.defaultTag).toBe('javascript');
      expect(adapter.info.extensions).toEqual(['js']);
      expect(adapter.threadSafe).toBe(true);
    });

    it('maps the js extension to its default tag', () => {
      expect(registry.getLanguageTagByExtension('.JS')).toBe('javascript');
    });
  });

  describe('source transforms', () => {
    it('prints literals as string literals', () => {
      expect(adapter.getSourceCodeForLiteralOutput('say "hi"\n')).toBe(
        'print("say \\"hi\\"\\n");'
      );
    });

    it('prints expressions', () => {
      expect(adapter.getSourceCodeForExpressionOutput('a + b')).toBe(
        'print(a + b);'
      );
    });

    it('includes through the exposed service', () => {
      expect(
        adapter.getSourceCodeForExpressionInclude("'nav'", compile(''))
      ).toBe("await executable.include('nav');");
    });
  });

  describe('wrapSource', () => {
    it('wraps source in an async function', () => {
      expect(wrapSource('print(1)')).toBe(
        '(async function () { print(1)\n}).call(globalThis);'
      );
    });

    it('publishes top-level function declarations', () => {
      expect(wrapSource('function a() {}')).toBe(
        "(async function () { if (typeof a === 'function') globalThis.a = a;function a() {}\n}).call(globalThis);"
      );
    });
  });

  describe('execution', () => {
    it('interleaves text and expressions', async () => {
      expect(await render('1 + 1 = <%= 1 + 1 %>.')).toBe('1 + 1 = 2.');
    });

    it('reads exposed variables', async () => {
      const context = new ExecutionContext({
        exposedVariables: { name: 'Ada' },
      });
      expect(await render('Hello <%= name %>!', context)).toBe('Hello Ada!');
    });

    it('lets scriptlets await', async () => {
      expect(
        await render("<% await Promise.resolve(); print('done') %>")
      ).toBe('done');
    });

    it('writes lines with println', async () => {
      expect(await render("<% println('a'); println() %>")).toBe('a\n\n');
    });

    it('keeps globals per execution context', async () => {
      const executable = compile(
        '<% globalThis.counter = (globalThis.counter ?? 0) + 1; print(counter) %>'
      );
      const writer = new StringWriter();
      const shared = new ExecutionContext({ writer });
      await executable.execute(shared);
      await executable.execute(shared);
      expect(writer.toString()).toBe('12');

      const fresh = new StringWriter();
      await executable.execute(new ExecutionContext({ writer: fresh }));
      expect(fresh.toString()).toBe('1');
    });

    it('repeats loop bodies around literal text', async () => {
      const output = await render(
        '<% for (const item of [1, 2, 3]) { %>[<%= item %>]<% } %>'
      );
      expect(output).toBe('[1][2][3]');
    });
  });

  describe('nested documents', () => {
    it('sees its own executable again after an include returns', async () => {
      const source = new InMemoryDocumentSource();
      source.setDocument('inner', '<% print("[in]"); %>', '');
      const service = new DocumentService({
        source,
        registry,
        defaultLanguageTag: 'js',
      });
      const outer = new Executable({
        documentName: 'outer',
        sourceCode:
          "<% await executable.include('inner'); print(executable.documentName); %>",
        registry,
        defaultLanguageTag: 'js',
      });

      const writer = new StringWriter();
      const context = new ExecutionContext({ writer });
      await outer.execute(context, service);
      expect(writer.toString()).toBe('[in]outer');
      expect(context.services.has('executable')).toBe(false);
    });
  });

  describe('entry points', () => {
    it('calls async entry points with arguments', async () => {
      const executable = compile(
        '<% async function add(a, b) { await null; return a + b; } %>'
      );
      await executable.makeEnterable(new ExecutionContext());
      expect(await executable.enter('add', 2, 3)).toBe(5);
    });

    it('forgets entry points once the context is released', async () => {
      const executable = compile('<% function ping() { return "pong"; } %>');
      const context = new ExecutionContext();
      await executable.makeEnterable(context);
      executable.release();
      await expect(
        javascript.enter('ping', executable, context, [])
      ).rejects.toThrow('No such entry point: ping');
    });
  });
});
