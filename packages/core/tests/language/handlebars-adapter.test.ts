/**
 * Weft Language Tests: Handlebars Adapter
 */

import { describe, expect, it } from 'vitest';

import {
  DocumentService,
  EntryPointNotFoundError,
  Executable,
  ExecutionContext,
  ExecutionError,
  HandlebarsAdapter,
  InMemoryDocumentSource,
  JavaScriptAdapter,
  LanguageRegistry,
  ParsingError,
  StringWriter,
} from 'weft';

const registry = new LanguageRegistry([
  new JavaScriptAdapter(),
  new HandlebarsAdapter(),
]);

function compile(sourceCode: string, prepare = false): Executable {
  return new Executable({
    documentName: 'page',
    sourceCode,
    registry,
    defaultLanguageTag: 'hbs',
    prepare,
  });
}

async function render(
  sourceCode: string,
  variables: Record<string, unknown> = {}
): Promise<string> {
  const writer = new StringWriter();
  await compile(sourceCode).execute(
    new ExecutionContext({ writer, exposedVariables: variables })
  );
  return writer.toString();
}

describe('Weft Language: Handlebars Adapter', () => {
  const adapter = new HandlebarsAdapter();

  it('is registered under handlebars and hbs', () => {
    expect(adapter.info.tags).toEqual(['handlebars', 'hbs']);
    expect(registry.getLanguageTagByExtension('hbs')).toBe('handlebars');
    expect(adapter.threadSafe).toBe(false);
  });

  describe('source transforms', () => {
    it('hides literal text from the template parser', () => {
      expect(adapter.getSourceCodeForLiteralOutput('a {{b}} c')).toBe(
        '{{{weftLiteral "YSB7e2J9fSBj"}}}'
      );
    });

    it('renders expressions unescaped', () => {
      expect(adapter.getSourceCodeForExpressionOutput('name')).toBe(
        '{{{name}}}'
      );
    });

    it('includes through the include helper', () => {
      expect(adapter.getSourceCodeForExpressionInclude("'nav'")).toBe(
        "{{include 'nav'}}"
      );
    });
  });

  describe('rendering', () => {
    it('renders a template scriptlet against exposed variables', async () => {
      expect(await render('<%hbs Hello {{name}}!%>', { name: 'Ada' })).toBe(
        'Hello Ada!'
      );
    });

    it('renders expression scriptlets and folded text', async () => {
      expect(await render('Hi <%=hbs name%>.', { name: '<b>' })).toBe(
        'Hi <b>.'
      );
    });

    it('keeps mustaches in folded literal text', async () => {
      expect(await render('<%=hbs name%> {{literal}}', { name: 'Ada' })).toBe(
        'Ada {{literal}}'
      );
    });

    it('keeps escaped mustaches in folded literal text', async () => {
      expect(await render('<%= x %> and \\{{x}}', { x: 'X' })).toBe(
        'X and \\{{x}}'
      );
    });

    it('keeps a trailing backslash from escaping the next scriptlet', async () => {
      expect(await render('<%= x %> C:\\<%= x %>', { x: 'X' })).toBe(
        'X C:\\X'
      );
    });

    it('mixes with JavaScript scriptlets', async () => {
      expect(
        await render('<%js print(1); %>-<%hbs {{n}}%>', { n: 2 })
      ).toBe('1-2');
    });
  });

  describe('includes', () => {
    it('writes included documents at the helper position', async () => {
      const source = new InMemoryDocumentSource();
      source.setDocument('footer', 'Footer text', '');
      source.setDocument('main', "<%hbs Main {{include 'footer'}} end%>", '');
      const service = new DocumentService({
        source,
        registry,
        defaultLanguageTag: 'hbs',
      });

      const writer = new StringWriter();
      const main = await service.getExecutable('main', true);
      await main.execute(new ExecutionContext({ writer }), service);
      expect(writer.toString()).toBe('Main Footer text end');
    });

    it('includes through the shorthand', async () => {
      const source = new InMemoryDocumentSource();
      source.setDocument('nav', 'NAV', '');
      source.setDocument('main', "[<%&hbs 'nav'%>]", '');
      const service = new DocumentService({
        source,
        registry,
        defaultLanguageTag: 'hbs',
      });

      const writer = new StringWriter();
      const main = await service.getExecutable('main', true);
      await main.execute(new ExecutionContext({ writer }), service);
      expect(writer.toString()).toBe('[NAV]');
    });

    it('includes a document of the same language without deadlocking', async () => {
      const source = new InMemoryDocumentSource();
      source.setDocument('inner', '<%hbs ({{word}})%>', '');
      source.setDocument('outer', "<%hbs <{{include 'inner'}}>%>", '');
      const service = new DocumentService({
        source,
        registry,
        defaultLanguageTag: 'hbs',
      });

      const writer = new StringWriter();
      const outer = await service.getExecutable('outer', true);
      await outer.execute(
        new ExecutionContext({ writer, exposedVariables: { word: 'w' } }),
        service
      );
      expect(writer.toString()).toBe('<(w)>');
    });

    it('fails without a container', async () => {
      await expect(render("<%hbs {{include 'x'}}%>")).rejects.toBeInstanceOf(
        ExecutionError
      );
    });
  });

  describe('errors', () => {
    it('reports template syntax errors as WEFT-P003', () => {
      let caught: unknown;
      try {
        compile('<%hbs {{#if x}}open%>', true);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ParsingError);
      if (caught instanceof ParsingError) {
        expect(caught.errorId).toBe('WEFT-P003');
        expect(
          caught.message.startsWith('Could not prepare handlebars program: ')
        ).toBe(true);
        expect(caught.frames).toEqual([
          { documentName: 'page', line: 1, column: 1 },
        ]);
      }
    });

    it('has no entry points', async () => {
      const executable = compile('<%hbs x%>');
      await executable.makeEnterable(new ExecutionContext());
      await expect(executable.enter('x')).rejects.toBeInstanceOf(
        EntryPointNotFoundError
      );
    });
  });
});
