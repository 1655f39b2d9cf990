import { describe, it, expect, vi, afterEach } from 'vitest';
import { CliUsageError } from '../args.js';
import { withErrorHandling } from './errorHandling.js';

async function settle(): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, 0));
}

describe('withErrorHandling', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('sets the exit code from the command result', async () => {
    withErrorHandling(() => Promise.resolve({ exitCode: 1 }));
    await settle();

    expect(process.exitCode).toBe(1);
  });

  it('prints an escaped error with suggestions and its exit code', async () => {
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    withErrorHandling(() => {
      throw new CliUsageError('Unknown option: --x');
    });
    await settle();

    expect(process.exitCode).toBe(2);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      'Error: Unknown option: --x\n\nSuggestions:\n  1. Check the option names and their values\n    gwt-prose --help'
    );
  });

  it('exits with 1 for unexpected errors', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    withErrorHandling(() => Promise.reject(new Error('boom')));
    await settle();

    expect(process.exitCode).toBe(1);
  });
});
