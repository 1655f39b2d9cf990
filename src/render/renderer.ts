/**
 * Renderer for rephrased tests.
 *
 * Produces output lines for plain text and Markdown in verbose and brief
 * layouts. Rendering never writes; callers print the returned lines.
 *
 * @packageDocumentation
 */

import { splitClause } from '../rephrase/index.js';
import type { ClauseNode, RephrasedTest, ValidRephrasedTest } from '../rephrase/index.js';
import type { OutputConfig, OutputStyle } from '../config/index.js';

/**
 * Thrown when a render routine receives an output style it does not know.
 * The CLI validates styles first, so this only signals a programming error.
 */
export class RenderStyleError extends Error {
  /** The unrecognized style value. */
  public readonly style: string;

  constructor(style: string) {
    super(`Unsupported output style '${style}'`);
    this.name = 'RenderStyleError';
    this.style = style;
  }
}

/**
 * Where a test sits in its input unit.
 */
export interface RenderPosition {
  /** Whether the testcase heading is emitted before this test. */
  readonly showHeading: boolean;
  /** Whether this is the final test of its input unit. */
  readonly isLastInUnit: boolean;
}

const INDENT = '  ';
const INVALID_NOTE = '(invalid test name)';

/**
 * Splits every present clause of a valid test into a tree, in display order.
 * Clauses with empty text are left out.
 */
export function clauseTrees(test: ValidRephrasedTest): ClauseNode[] {
  const clauses: [string, string | undefined][] = [
    ['GIVEN', test.given],
    ['WHEN', test.when],
    ['THEN', test.then],
    [test.sothatKeyword, test.sothat],
  ];
  const trees: ClauseNode[] = [];
  for (const [tag, text] of clauses) {
    if (text !== undefined && text !== '') {
      trees.push(splitClause(tag, text));
    }
  }
  return trees;
}

function joinWords(...parts: readonly string[]): string {
  return parts.filter((part) => part !== '').join(' ');
}

function flattenTree(node: ClauseNode, format: (tag: string) => string): string[] {
  return [format(node.tag), node.body, ...node.children.flatMap((child) => flattenTree(child, format))];
}

function textTreeLines(node: ClauseNode, indent: string): string[] {
  return [
    `${indent}${joinWords(node.tag, node.body)}`,
    ...node.children.flatMap((child) => textTreeLines(child, indent + INDENT)),
  ];
}

function markdownTreeLines(node: ClauseNode, indent: string): string[] {
  return [
    `${indent}- ${joinWords(`**${node.tag}**`, node.body)}`,
    ...node.children.flatMap((child) => markdownTreeLines(child, indent + INDENT)),
  ];
}

function renderTextTest(test: RephrasedTest, brief: boolean): string[] {
  const indent = test.testcaseName === undefined ? '' : INDENT;
  if (test.kind === 'invalid') {
    return [`${indent}${test.invalidRawName} ${INVALID_NOTE}`];
  }

  const trees = clauseTrees(test);
  if (brief) {
    const words = trees.flatMap((tree) => flattenTree(tree, (tag) => tag));
    return [`${indent}${joinWords(test.disabled ? 'DISABLED' : '', ...words)}`];
  }
  return [
    ...(test.disabled ? [`${indent}DISABLED`] : []),
    ...trees.flatMap((tree) => textTreeLines(tree, indent)),
  ];
}

function renderMarkdownTest(test: RephrasedTest, brief: boolean): string[] {
  if (test.kind === 'invalid') {
    return [`- ~~${test.invalidRawName}~~ *${INVALID_NOTE}*`];
  }

  const trees = clauseTrees(test);
  if (brief) {
    const words = trees.flatMap((tree) => flattenTree(tree, (tag) => `**${tag}**`));
    return [`- ${joinWords(test.disabled ? '*DISABLED*' : '', ...words)}`];
  }
  return [
    ...(test.disabled ? ['- *DISABLED*'] : []),
    ...trees.flatMap((tree) => markdownTreeLines(tree, '')),
  ];
}

function headingLines(testcaseName: string, style: OutputStyle): string[] {
  switch (style) {
    case 'text':
      return [testcaseName];
    case 'markdown':
      return [`### ${testcaseName}`, ''];
    default: {
      const unknownStyle: never = style;
      throw new RenderStyleError(String(unknownStyle));
    }
  }
}

/**
 * Renders one test.
 *
 * @param test - The rephrased test.
 * @param position - Heading and end-of-unit flags for this test.
 * @param output - Output layout settings.
 * @returns Lines without trailing newlines; a blank line is an empty string.
 * @throws RenderStyleError for an unknown output style.
 */
export function renderTest(test: RephrasedTest, position: RenderPosition, output: OutputConfig): string[] {
  const lines: string[] = [];

  if (position.showHeading && test.testcaseName !== undefined) {
    lines.push(...headingLines(test.testcaseName, output.style));
  }

  switch (output.style) {
    case 'text':
      lines.push(...renderTextTest(test, output.brief));
      break;
    case 'markdown':
      lines.push(...renderMarkdownTest(test, output.brief));
      break;
    default: {
      const unknownStyle: never = output.style;
      throw new RenderStyleError(String(unknownStyle));
    }
  }

  // Brief output only separates units; verbose output separates every test.
  const separated = output.brief ? position.isLastInUnit : true;
  if (separated && !(position.isLastInUnit && !output.trailing_blank_line)) {
    lines.push('');
  }
  return lines;
}

/**
 * Renders all tests of one input unit.
 *
 * A heading is emitted whenever a test's testcase name differs from the test
 * immediately before it in the unit.
 *
 * @param tests - Rephrased tests in input order.
 * @param output - Output layout settings.
 * @returns Lines without trailing newlines.
 * @throws RenderStyleError for an unknown output style.
 *
 * @example
 * ```typescript
 * renderUnit(tests, { brief: true, style: 'text', trailing_blank_line: false });
 * // ['Stack', '  WHEN Pop is called THEN it throws']
 * ```
 */
export function renderUnit(tests: readonly RephrasedTest[], output: OutputConfig): string[] {
  const lines: string[] = [];
  let previousTestcase: string | undefined;

  tests.forEach((test, index) => {
    const showHeading = test.testcaseName !== undefined && test.testcaseName !== previousTestcase;
    previousTestcase = test.testcaseName;

    if (showHeading && output.style === 'markdown' && lines.length > 0 && lines[lines.length - 1] !== '') {
      lines.push('');
    }
    lines.push(...renderTest(test, { showHeading, isLastInUnit: index === tests.length - 1 }, output));
  });

  return lines;
}
