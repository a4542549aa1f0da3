/**
 * Prompt Errors
 *
 * All errors thrown by @promptdeck/prompts extend PromptError so callers can
 * separate prompt problems from I/O failures.
 */

export class PromptError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PromptError';
  }
}

/** Template text that does not parse */
export class PromptTemplateError extends PromptError {
  constructor(message: string) {
    super(message);
    this.name = 'PromptTemplateError';
  }
}

export class MissingParametersError extends PromptError {
  public readonly templateName: string;
  public readonly missing: string[];

  constructor(templateName: string, missing: string[]) {
    super(`Missing parameters for prompt template '${templateName}': ${missing.join(', ')}`);
    this.name = 'MissingParametersError';
    this.templateName = templateName;
    this.missing = missing;
  }
}

export class LanguageNotFoundError extends PromptError {
  constructor(message: string) {
    super(message);
    this.name = 'LanguageNotFoundError';
  }
}

export class DuplicateLanguageError extends PromptError {
  constructor(name: string, language: string) {
    super(`Item for language '${language}' already registered for name '${name}'`);
    this.name = 'DuplicateLanguageError';
  }
}

export class InconsistentParametersError extends PromptError {
  constructor(name: string, language: string, expected: readonly string[], actual: readonly string[]) {
    super(
      `Cannot add prompt template for language '${language}' to '${name}': ` +
      `parameters [${actual.join(', ')}] differ from [${expected.join(', ')}]`
    );
    this.name = 'InconsistentParametersError';
  }
}

export class PromptNotFoundError extends PromptError {
  constructor(kind: 'template' | 'list', name: string, available: string[]) {
    const known = available.length > 0 ? available.join(', ') : 'none';
    super(`Unknown prompt ${kind} '${name}' (available: ${known})`);
    this.name = 'PromptNotFoundError';
  }
}

/** A prompt YAML file with the wrong structure */
export class PromptFileError extends PromptError {
  public readonly filePath: string;
  public readonly errors: string[];

  constructor(filePath: string, errors: string[]) {
    super(`Invalid prompt file ${filePath}:\n${errors.map(err => `  • ${err}`).join('\n')}`);
    this.name = 'PromptFileError';
    this.filePath = filePath;
    this.errors = errors;
  }
}
