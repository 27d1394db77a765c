import { describe, it, expect } from 'vitest';
import { LOG_LEVEL_ENV, UsageError, parseArguments, runCli, type CliIo } from '../../src/cli/runCli.js';
import { fixturePath } from '../helpers/xml.js';

function captureIo(): CliIo & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => {
      out.push(line);
    },
    stderr: (line) => {
      err.push(line);
    },
  };
}

describe('parseArguments', () => {
  it('should collect positional files with default options', () => {
    expect(parseArguments(['a.drawio', 'b.drawio'])).toEqual({
      files: ['a.drawio', 'b.drawio'],
      format: 'text',
      logLevel: 'warn',
      help: false,
    });
  });

  it('should read option values in both spellings', () => {
    const parsed = parseArguments(['-f', 'json', '--log-level=debug', 'a.drawio']);

    expect(parsed.format).toBe('json');
    expect(parsed.logLevel).toBe('debug');
    expect(parsed.files).toEqual(['a.drawio']);
  });

  it('should take the log level default from the environment', () => {
    expect(parseArguments([], { [LOG_LEVEL_ENV]: 'info' }).logLevel).toBe('info');
    expect(parseArguments(['--log-level', 'error'], { [LOG_LEVEL_ENV]: 'info' }).logLevel).toBe('error');
    expect(parseArguments([], { [LOG_LEVEL_ENV]: 'loud' }).logLevel).toBe('warn');
  });

  it('should treat everything after -- as files', () => {
    expect(parseArguments(['--', '--format']).files).toEqual(['--format']);
  });

  it('should reject unknown options and values', () => {
    expect(() => parseArguments(['--verbose'])).toThrow(UsageError);
    expect(() => parseArguments(['--format', 'csv'])).toThrow("Unknown format 'csv' (expected text, markdown, json)");
    expect(() => parseArguments(['--log-level', 'loud'])).toThrow("Unknown log level 'loud'");
    expect(() => parseArguments(['--format'])).toThrow('Option --format requires a value');
  });
});

describe('runCli', () => {
  it('should print a header and a table per file', () => {
    const io = captureIo();
    const basic = fixturePath('basic.drawio');

    const code = runCli([basic], io, {});

    expect(code).toBe(0);
    expect(io.out).toEqual([`== Processing ${basic}`, ['   id  content  style', '0  1   Box      rounded=1'].join('\n')]);
    expect(io.err).toEqual([]);
  });

  it('should process several files in order', () => {
    const io = captureIo();
    const basic = fixturePath('basic.drawio');
    const mixed = fixturePath('mixed.drawio');

    const code = runCli(['--format', 'markdown', basic, mixed], io, {});

    expect(code).toBe(0);
    expect(io.out[0]).toBe(`== Processing ${basic}`);
    expect(io.out[1]).toBe('| id | content | style |\n| --- | --- | --- |\n| 1 | Box | rounded=1 |');
    expect(io.out[2]).toBe(`== Processing ${mixed}`);
    expect(io.out[3].split('\n')).toHaveLength(7);
  });

  it('should stop at the first failing file', () => {
    const io = captureIo();
    const basic = fixturePath('basic.drawio');
    const unhandled = fixturePath('unhandled.drawio');
    const mixed = fixturePath('mixed.drawio');

    const code = runCli([basic, unhandled, mixed], io, {});

    expect(code).toBe(1);
    expect(io.out).toHaveLength(3);
    expect(io.out[2]).toBe(`== Processing ${unhandled}`);
    expect(io.err).toEqual(["Error: No parser for shape element 'mxPoint' at position 1"]);
  });

  it('should report an unreadable file', () => {
    const io = captureIo();
    const missing = fixturePath('missing.drawio');

    const code = runCli(['--log-level', 'silent', missing], io, {});

    expect(code).toBe(1);
    expect(io.err).toHaveLength(1);
    expect(io.err[0].startsWith(`Error: ${missing}: cannot read file:`)).toBe(true);
  });

  it('should require at least one file', () => {
    const io = captureIo();

    expect(runCli([], io, {})).toBe(1);
    expect(io.err[0]).toBe('At least one diagram file is required');
    expect(io.err[1]).toBe('Usage: drawio-shapes [options] <file...>');
  });

  it('should print usage for --help', () => {
    const io = captureIo();

    expect(runCli(['--help'], io, {})).toBe(0);
    expect(io.out[0]).toBe('Usage: drawio-shapes [options] <file...>');
    expect(io.err).toEqual([]);
  });

  it('should print usage for a bad option', () => {
    const io = captureIo();

    expect(runCli(['--format', 'csv', 'a.drawio'], io, {})).toBe(1);
    expect(io.err[0]).toBe("Unknown format 'csv' (expected text, markdown, json)");
    expect(io.out).toEqual([]);
  });
});
