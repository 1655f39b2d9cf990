/**
 * Integration tests for the gwt-prose command.
 *
 * Runs the whole command in process against real files in a temporary
 * directory, with stdout, stderr and stdin injected.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rm, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { HELP_TEXT, runCli } from '../../src/cli/app.js';
import type { CliIo } from '../../src/cli/types.js';

const REFCOUNT_SOURCE = `#include "refcount.h"

TEST(RefCount, Test_AddRef__increments_the_reference_count_and_returns_its_new_value)
{
}

TEST_F(QueryInterface,
       MAKE_TEST_NAME(Given_coclass_implements_multiple_interfaces,
                      QuerryInterface,
                      returns_the_same_ptr_for_all_IUnknown_interfaces_of_coclass))
{
}
`;

const STACK_SOURCE = `TEST(Stack, DISABLED_Test_an_empty_stack__Pop__throws__Because_there_is_nothing_to_return) {}
TEST(Stack, Pop___twice) {}
`;

describe('CLI Integration Tests', () => {
  let testDir: string;
  let originalCwd: string;
  let out: string[];
  let err: string[];
  let stdinText: string;

  function createIo(): CliIo {
    return {
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
      readStdin: () => Promise.resolve(stdinText),
      colors: false,
    };
  }

  beforeEach(async () => {
    originalCwd = process.cwd();
    testDir = join(tmpdir(), `gwt-prose-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    await writeFile(join(testDir, 'refcount_test.cpp'), REFCOUNT_SOURCE);
    await writeFile(join(testDir, 'stack_test.cpp'), STACK_SOURCE);
    out = [];
    err = [];
    stdinText = '';

    process.chdir(testDir);
  });

  afterEach(async () => {
    process.chdir(originalCwd);
    await rm(testDir, { recursive: true, force: true });
  });

  describe('file inputs', () => {
    it('renders every test of a source file in the verbose text layout', async () => {
      const result = await runCli(['refcount_test.cpp'], createIo(), {});

      expect(result.exitCode).toBe(0);
      expect(err).toEqual([]);
      expect(out.join('')).toBe(
        [
          'RefCount',
          '  GIVEN (unspecified)',
          '  WHEN AddRef is called',
          '  THEN it increments the reference count',
          '    AND returns its new value',
          '',
          'QueryInterface',
          '  GIVEN coclass implements multiple interfaces',
          '  WHEN QuerryInterface is called',
          '  THEN it returns the same ptr for all IUnknown interfaces of coclass',
          '',
          '',
        ].join('\n')
      );
    });

    it('shows disabled tests, so-that clauses and invalid names', async () => {
      const result = await runCli(['stack_test.cpp'], createIo(), {});

      expect(result.exitCode).toBe(0);
      expect(out.join('')).toBe(
        [
          'Stack',
          '  DISABLED',
          '  GIVEN an empty stack',
          '  WHEN Pop is called',
          '  THEN it throws',
          '  BECAUSE there is nothing to return',
          '',
          '  Pop   twice (invalid test name)',
          '',
          '',
        ].join('\n')
      );
    });

    it('renders brief markdown without trailing blank lines', async () => {
      const result = await runCli(
        ['--brief', '--markdown', '-T', 'refcount_test.cpp', 'stack_test.cpp'],
        createIo(),
        {}
      );

      expect(result.exitCode).toBe(0);
      expect(out).toEqual([
        [
          '### RefCount',
          '',
          '- **WHEN** AddRef is called **THEN** it increments the reference count **AND** returns its new value',
          '',
          '### QueryInterface',
          '',
          '- **GIVEN** coclass implements multiple interfaces **WHEN** QuerryInterface is called **THEN** it returns the same ptr for all IUnknown interfaces of coclass',
          '',
        ].join('\n'),
        [
          '### Stack',
          '',
          '- *DISABLED* **GIVEN** an empty stack **WHEN** Pop is called **THEN** it throws **BECAUSE** there is nothing to return',
          '- ~~Pop   twice~~ *(invalid test name)*',
          '',
        ].join('\n'),
      ]);
    });

    it('reports an unreadable file, keeps going and exits with 1', async () => {
      const result = await runCli(['missing.cpp', 'stack_test.cpp'], createIo(), {});

      expect(result.exitCode).toBe(1);
      expect(err).toHaveLength(1);
      expect(err[0]).toMatch(/^Error: cannot read 'missing\.cpp': ENOENT: no such file or directory/);
      expect(out).toHaveLength(1);
      expect(out[0]?.startsWith('Stack\n  DISABLED\n')).toBe(true);
    });

    it('reads source text from stdin when there are no inputs', async () => {
      stdinText = 'TEST(Stack, Test_Pop__throws) {}';

      const result = await runCli(['--brief'], createIo(), {});

      expect(result.exitCode).toBe(0);
      expect(out.join('')).toBe('Stack\n  WHEN Pop is called THEN it throws\n\n');
    });
  });

  describe('name inputs', () => {
    it('treats inputs as literal names', async () => {
      const result = await runCli(
        ['--names', '--brief', 'Test_AddRef__increments_the_count', 'Foo'],
        createIo(),
        {}
      );

      expect(result.exitCode).toBe(0);
      expect(out.join('')).toBe(
        'WHEN AddRef is called THEN it increments the count\nWHEN Foo is called\n\n'
      );
    });

    it('reads one name per line from stdin', async () => {
      stdinText = 'Given_a_stack__Push__grows\nThen_nothing_happens\n';

      const result = await runCli(['-n', '-'], createIo(), { GWT_PROSE_BRIEF: 'yes' });

      expect(result.exitCode).toBe(0);
      expect(out.join('')).toBe('GIVEN a stack WHEN Push is called THEN it grows\nTHEN nothing happens\n\n');
    });
  });

  describe('configuration', () => {
    it('applies gwt-prose.toml from the working directory', async () => {
      await writeFile(join(testDir, 'gwt-prose.toml'), '[input]\nmode = "name"\n\n[output]\nbrief = true\n');

      const result = await runCli(['Foo'], createIo(), {});

      expect(result.exitCode).toBe(0);
      expect(out.join('')).toBe('WHEN Foo is called\n\n');
    });

    it('lets flags override the environment', async () => {
      const result = await runCli(['--style', 'text', '--names', 'Foo'], createIo(), {
        GWT_PROSE_STYLE: 'markdown',
        GWT_PROSE_TRAILING_BLANK_LINE: 'false',
      });

      expect(result.exitCode).toBe(0);
      expect(out.join('')).toBe('GIVEN (unspecified)\nWHEN Foo is called\nTHEN (unspecified)\n');
    });

    it('warns about a broken default config file and uses defaults', async () => {
      await writeFile(join(testDir, 'gwt-prose.toml'), 'invalid [ toml');

      const result = await runCli(['--names', '-b', 'Foo'], createIo(), {});

      expect(result.exitCode).toBe(0);
      expect(err[0]).toMatch(/^Warning: Failed to load config from gwt-prose\.toml: Invalid TOML syntax/);
      expect(err[1]).toBe('Using default settings.\n');
      expect(out.join('')).toBe('WHEN Foo is called\n\n');
    });

    it('writes JSON debug entries to stderr with --debug', async () => {
      const result = await runCli(['--debug', '--names', 'Foo', 'Foo___Bar'], createIo(), {});

      expect(result.exitCode).toBe(0);
      const events = err.map((line) => (JSON.parse(line) as { component: string; event: string }).event);
      expect(events).toEqual(['unit_started', 'name_parsed', 'name_invalid', 'unit_finished']);
    });
  });

  describe('help, version and usage errors', () => {
    it('prints help', async () => {
      const result = await runCli(['--help'], createIo(), {});

      expect(result.exitCode).toBe(0);
      expect(out).toEqual([HELP_TEXT]);
      expect(HELP_TEXT.split('\n')).toContain(
        '  GWT_PROSE_STYLE                Output markup style (output.style) [text | markdown]'
      );
    });

    it('prints the package version', async () => {
      const result = await runCli(['-v'], createIo(), {});

      expect(result.exitCode).toBe(0);
      expect(out).toEqual(['gwt-prose v0.1.0\n']);
    });

    it('exits with 2 for an empty config path', async () => {
      const result = await runCli(['--config=', '--names', 'Foo'], createIo(), {});

      expect(result.exitCode).toBe(2);
      expect(err.join('')).toMatch(/^Error: Path cannot be empty\n/);
    });

    it('exits with 2 for an unknown option', async () => {
      const result = await runCli(['--bogus'], createIo(), {});

      expect(result.exitCode).toBe(2);
      expect(out).toEqual([]);
      expect(err.join('')).toBe(
        [
          'Error: Unknown option: --bogus',
          '',
          'Suggestions:',
          '  1. Check the option names and their values',
          '    gwt-prose --help',
          '',
        ].join('\n')
      );
    });
  });
});
