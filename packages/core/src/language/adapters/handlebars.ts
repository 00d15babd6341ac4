/**
 * Handlebars Adapter
 * Programs are Handlebars templates rendered against the context's variables
 */

import Handlebars from 'handlebars';

import { ExecutionError, ParsingError } from '../../error-classes.js';
import type { ExecutionContext } from '../../runtime/context.js';
import { ExecutableService } from '../../runtime/services.js';
import { VERSION } from '../../version.js';
import type {
  LanguageAdapter,
  LanguageAdapterInfo,
  Program,
  ProgramOptions,
} from '../adapter.js';

/** Separates rendered text from include slots */
const INCLUDE_MARKER = '\u0000';

/** Helper that writes folded literal text back verbatim */
const LITERAL_HELPER = 'weftLiteral';

type HandlebarsEnvironment = typeof Handlebars;

function createEnvironment(): HandlebarsEnvironment {
  const env = Handlebars.create();

  // Includes run after rendering; the helper only reserves a slot
  env.registerHelper(
    'include',
    function (name: unknown, options: Handlebars.HelperOptions) {
      const data: unknown = options.data;
      const includes: unknown =
        typeof data === 'object' && data !== null && 'includes' in data
          ? data.includes
          : undefined;
      if (!Array.isArray(includes)) {
        throw new Error('include is only available inside weft documents');
      }
      const slot = includes.push(name) - 1;
      return new env.SafeString(`${INCLUDE_MARKER}${slot}${INCLUDE_MARKER}`);
    }
  );

  // Literal text travels base64-encoded so the template never parses it
  env.registerHelper(LITERAL_HELPER, function (encoded: unknown) {
    return new env.SafeString(
      Buffer.from(String(encoded), 'base64').toString('utf8')
    );
  });

  return env;
}

// ============================================================
// PROGRAM
// ============================================================

class HandlebarsProgram implements Program {
  private template: Handlebars.TemplateDelegate | undefined;

  constructor(
    readonly sourceCode: string,
    private readonly env: HandlebarsEnvironment,
    private readonly options: ProgramOptions
  ) {}

  prepare(): void {
    this.compile();
  }

  async execute(context: ExecutionContext): Promise<void> {
    const template = this.compile();
    const variables: Record<string, unknown> = {};
    for (const [name, value] of context.services) {
      variables[name] = value;
    }
    for (const [name, value] of context.exposedVariables) {
      variables[name] = value;
    }

    const includes: unknown[] = [];
    const output = template(variables, { data: { includes } });

    const parts = output.split(INCLUDE_MARKER);
    for (const [index, part] of parts.entries()) {
      if (index % 2 === 0) {
        if (part.length > 0) {
          context.writer.write(part);
        }
        continue;
      }
      await this.include(String(includes[Number(part)]), context);
    }
  }

  private async include(
    documentName: string,
    context: ExecutionContext
  ): Promise<void> {
    const service = context.services.get(
      this.options.executable.exposedName
    );
    if (!(service instanceof ExecutableService)) {
      throw new ExecutionError(
        'WEFT-E004',
        'Container does not support include',
        undefined,
        { operation: 'include' }
      );
    }
    await service.include(documentName);
  }

  private compile(): Handlebars.TemplateDelegate {
    if (this.template) {
      return this.template;
    }
    try {
      // compile() is lazy; parse() surfaces syntax errors now
      this.env.parse(this.sourceCode);
      this.template = this.env.compile(this.sourceCode);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ParsingError(
        'WEFT-P003',
        `Could not prepare handlebars program: ${reason}`,
        undefined,
        { tag: 'handlebars', reason },
        error
      );
    }
    return this.template;
  }
}

// ============================================================
// ADAPTER
// ============================================================

export class HandlebarsAdapter implements LanguageAdapter {
  readonly info: LanguageAdapterInfo = {
    name: 'Handlebars',
    version: VERSION,
    languageName: 'Handlebars',
    tags: ['handlebars', 'hbs'],
    extensions: ['hbs', 'handlebars'],
    defaultTag: 'handlebars',
    defaultExtension: 'hbs',
  };

  readonly threadSafe = false;

  private readonly env = createEnvironment();

  getSourceCodeForLiteralOutput(literal: string): string {
    const encoded = Buffer.from(literal, 'utf8').toString('base64');
    return `{{{${LITERAL_HELPER} "${encoded}"}}}`;
  }

  getSourceCodeForExpressionOutput(expression: string): string {
    return `{{{${expression}}}}`;
  }

  getSourceCodeForExpressionInclude(expression: string): string {
    return `{{include ${expression}}}`;
  }

  createProgram(sourceCode: string, options: ProgramOptions): Program {
    return new HandlebarsProgram(sourceCode, this.env, options);
  }
}
