/**
 * Mode Errors
 */

export class ModeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModeError';
  }
}

/** A mode file or directory that cannot be read or has the wrong structure */
export class ModeLoadError extends ModeError {
  public readonly path: string;
  public readonly errors: string[];

  constructor(path: string, errors: string[]) {
    super(`Invalid mode ${path}:\n${errors.map(err => `  • ${err}`).join('\n')}`);
    this.name = 'ModeLoadError';
    this.path = path;
    this.errors = errors;
  }
}

export class UnknownModeError extends ModeError {
  public readonly modeName: string;

  constructor(modeName: string, known: string[]) {
    const available = known.length > 0 ? known.join(', ') : 'none';
    super(`Unknown mode '${modeName}' (available: ${available})`);
    this.name = 'UnknownModeError';
    this.modeName = modeName;
  }
}

export class DuplicateModeError extends ModeError {
  constructor(modeName: string, existingOrigin: string, newOrigin: string) {
    super(`Mode '${modeName}' from ${newOrigin} is already registered from ${existingOrigin}`);
    this.name = 'DuplicateModeError';
  }
}
