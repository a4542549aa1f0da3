/**
 * Prompt Templates
 *
 * Handlebars templates with parameter inference. The parameters of a template
 * are the top-level names it reads from the render context, so callers can be
 * told up front which values are required and code generation can type them.
 */

import Handlebars from 'handlebars';

import { MissingParametersError, PromptTemplateError } from './errors.js';

export type PromptParameters = Record<string, unknown>;

/** Built-in block helpers that render their body against a new context */
const CONTEXT_HELPERS = new Set(['each', 'with']);

function helperName(statement: hbs.AST.BlockStatement | hbs.AST.MustacheStatement): string {
  const path = statement.path;
  return 'original' in path && typeof path.original === 'string' ? path.original : '';
}

function hasArguments(statement: hbs.AST.BlockStatement | hbs.AST.MustacheStatement): boolean {
  return statement.params.length > 0 || Boolean(statement.hash);
}

/**
 * Collects root-context variable names from a parsed template
 *
 * Inside `each`/`with` (and bare sections such as `{{#user}}`) unqualified
 * names refer to the block context, so only `../` paths that climb back to the
 * root and `@root.` paths are counted there.
 */
class ParameterCollector extends Handlebars.Visitor {
  readonly names = new Set<string>();
  private scopeDepth = 0;

  MustacheStatement(mustache: hbs.AST.MustacheStatement): void {
    if (!hasArguments(mustache)) {
      this.accept(mustache.path);
      return;
    }
    // With arguments the path names a helper
    this.acceptArray(mustache.params);
    if (mustache.hash) {
      this.accept(mustache.hash);
    }
  }

  BlockStatement(block: hbs.AST.BlockStatement): void {
    let changesContext: boolean;
    if (hasArguments(block)) {
      this.acceptArray(block.params);
      if (block.hash) {
        this.accept(block.hash);
      }
      changesContext = CONTEXT_HELPERS.has(helperName(block));
    } else {
      this.accept(block.path);
      changesContext = true;
    }

    if (changesContext) {
      this.scopeDepth++;
    }
    this.accept(block.program);
    if (changesContext) {
      this.scopeDepth--;
    }

    if (block.inverse) {
      this.accept(block.inverse);
    }
  }

  SubExpression(sexpr: hbs.AST.SubExpression): void {
    this.acceptArray(sexpr.params);
    if (sexpr.hash) {
      this.accept(sexpr.hash);
    }
  }

  // Partials are resolved at render time, so their parameters cannot be known
  PartialStatement(partial: hbs.AST.PartialStatement): void {
    throw new PromptTemplateError(`Partials are not supported (line ${partial.loc.start.line})`);
  }

  PartialBlockStatement(partial: hbs.AST.PartialBlockStatement): void {
    throw new PromptTemplateError(`Partials are not supported (line ${partial.loc.start.line})`);
  }

  PathExpression(path: hbs.AST.PathExpression): void {
    if (path.data) {
      if (path.parts[0] === 'root' && path.parts.length > 1) {
        this.names.add(path.parts[1]);
      }
      return;
    }
    if (path.depth !== this.scopeDepth || path.parts.length === 0) {
      return;
    }
    this.names.add(path.parts[0]);
  }
}

/**
 * Infer the parameters of a template
 *
 * @returns Sorted, de-duplicated root variable names
 * @throws PromptTemplateError if the template does not parse
 *
 * @example
 * collectTemplateParameters('Hello {{user.name}}, {{#each tasks}}{{title}}{{/each}}');
 * // ['tasks', 'user']
 */
export function collectTemplateParameters(source: string): string[] {
  let program: hbs.AST.Program;
  try {
    program = Handlebars.parse(source);
  } catch (error) {
    throw new PromptTemplateError(error instanceof Error ? error.message : String(error));
  }

  const collector = new ParameterCollector();
  collector.accept(program);
  return [...collector.names].sort();
}

/**
 * A named prompt template
 *
 * Output is not HTML-escaped, and rendering fails when a parameter is missing
 * instead of silently producing an empty string.
 */
export class PromptTemplate {
  public readonly name: string;
  public readonly source: string;
  private readonly parameters: readonly string[];
  private readonly compiled: Handlebars.TemplateDelegate<PromptParameters>;

  constructor(name: string, source: string) {
    this.name = name;
    this.source = source.trim();

    try {
      this.parameters = collectTemplateParameters(this.source);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new PromptTemplateError(`Invalid prompt template '${name}': ${detail}`);
    }

    this.compiled = Handlebars.compile<PromptParameters>(this.source, {
      noEscape: true,
      strict: true,
    });
  }

  getParameters(): string[] {
    return [...this.parameters];
  }

  /**
   * @throws MissingParametersError when a parameter is not an own property of params
   * @throws PromptTemplateError when a nested field the template reads is missing
   */
  render(params: PromptParameters = {}): string {
    const missing = this.parameters.filter(name => !Object.hasOwn(params, name));
    if (missing.length > 0) {
      throw new MissingParametersError(this.name, missing);
    }
    try {
      return this.compiled(params);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new PromptTemplateError(`Cannot render prompt template '${this.name}': ${detail}`);
    }
  }
}
