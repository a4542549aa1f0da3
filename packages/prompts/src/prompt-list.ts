const BULLET = ' * ';
const CONTINUATION_INDENT = ' '.repeat(BULLET.length);

/**
 * An ordered list of prompt fragments (rules, hints, examples)
 */
export class PromptList {
  public readonly items: readonly string[];

  constructor(items: readonly string[]) {
    this.items = items.map(item => item.trim());
  }

  /**
   * Render as a bullet list meant to follow a leading ` * ` in the template
   *
   * Multi-line items keep their continuation lines aligned with the text.
   *
   * @example
   * new PromptList(['Read first', 'Then plan\nin detail']).toString();
   * // 'Read first\n * Then plan\n   in detail'
   */
  toString(): string {
    return this.items
      .map(item => item.replaceAll('\n', `\n${CONTINUATION_INDENT}`))
      .join(`\n${BULLET}`);
  }
}
