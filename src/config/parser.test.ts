import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { ConfigParseError, DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Config Parser', () => {
  describe('parseConfig', () => {
    describe('valid TOML parsing', () => {
      it('should parse empty TOML to default config', () => {
        const config = parseConfig('');
        expect(config).toEqual(DEFAULT_CONFIG);
      });

      it('should parse complete valid configuration', () => {
        const toml = `
[output]
brief = true
style = "markdown"
trailing_blank_line = false

[input]
mode = "name"

[logging]
debug = true
`;
        const config = parseConfig(toml);

        expect(config.output.brief).toBe(true);
        expect(config.output.style).toBe('markdown');
        expect(config.output.trailing_blank_line).toBe(false);
        expect(config.input.mode).toBe('name');
        expect(config.logging.debug).toBe(true);
      });

      it('should use default values for missing optional fields', () => {
        const toml = `
[output]
style = "markdown"
`;
        const config = parseConfig(toml);

        expect(config.output.style).toBe('markdown');
        expect(config.output.brief).toBe(false);
        expect(config.output.trailing_blank_line).toBe(true);
        expect(config.input).toEqual(DEFAULT_CONFIG.input);
        expect(config.logging).toEqual(DEFAULT_CONFIG.logging);
      });

      it('should ignore unknown sections and keys', () => {
        const toml = `
[output]
colour = "blue"

[plugins]
enabled = true
`;
        expect(parseConfig(toml)).toEqual(DEFAULT_CONFIG);
      });
    });

    describe('invalid TOML', () => {
      it('should throw ConfigParseError for invalid syntax', () => {
        expect(() => parseConfig('invalid [ toml')).toThrow(ConfigParseError);
        expect(() => parseConfig('invalid [ toml')).toThrow(/^Invalid TOML syntax: /);
      });

      it('should keep the underlying error as cause', () => {
        try {
          parseConfig('[output');
          expect.unreachable('parseConfig should have thrown');
        } catch (error) {
          expect(error).toBeInstanceOf(ConfigParseError);
          if (error instanceof ConfigParseError) {
            expect(error.cause).toBeInstanceOf(Error);
          }
        }
      });
    });

    describe('type validation', () => {
      it('should reject a non-boolean brief flag', () => {
        expect(() => parseConfig('[output]\nbrief = "yes"')).toThrow(
          "Invalid type for 'output.brief': expected boolean, got string"
        );
      });

      it('should reject an unknown output style', () => {
        expect(() => parseConfig('[output]\nstyle = "html"')).toThrow(
          "Invalid value for 'output.style': expected one of [text, markdown], got 'html'"
        );
      });

      it('should reject an unknown input mode', () => {
        expect(() => parseConfig('[input]\nmode = "glob"')).toThrow(
          "Invalid value for 'input.mode': expected one of [file, name], got 'glob'"
        );
      });

      it('should reject a section that is not a table', () => {
        expect(() => parseConfig('output = 3')).toThrow(
          "Invalid type for 'output': expected table, got number"
        );
      });

      it('should reject a non-boolean debug flag', () => {
        expect(() => parseConfig('[logging]\ndebug = 1')).toThrow(
          "Invalid type for 'logging.debug': expected boolean, got number"
        );
      });
    });
  });

  describe('property-based tests', () => {
    it('should round-trip any combination of output flags', () => {
      fc.assert(
        fc.property(
          fc.boolean(),
          fc.constantFrom('text', 'markdown'),
          fc.boolean(),
          (brief, style, trailing) => {
            const config = parseConfig(`
[output]
brief = ${String(brief)}
style = "${style}"
trailing_blank_line = ${String(trailing)}
`);
            return (
              config.output.brief === brief &&
              config.output.style === style &&
              config.output.trailing_blank_line === trailing
            );
          }
        ),
        { numRuns: 20 }
      );
    });
  });
});
