import { ConfigError } from '../../util/errors';
import { thrownBy } from '../../__tests__/fixtures/odxBuilder';
import { parseCliArgs, parseFailOnUnsupported, parseMaxFiles, pathOption } from '../args';

describe('parseCliArgs', () => {
  it('parses the analyze command and its paths', () => {
    const args = parseCliArgs(['analyze', '--source', 'flows', '--json', 'gap.json', '--report', 'gap.md', '--verbose']);
    expect(args).toEqual({
      command: 'analyze',
      source: 'flows',
      json: 'gap.json',
      report: 'gap.md',
      exclude: [],
      failOnUnsupported: false,
      verbose: true,
    });
  });

  it('handles short flags for parse', () => {
    const args = parseCliArgs(['parse', '-f', 'a.odx', '-o', 'a.json']);
    expect(args.command).toBe('parse');
    expect(args.file).toBe('a.odx');
    expect(args.out).toBe('a.json');
    expect(args.verbose).toBe(false);
  });

  it('leaves the command unset when the first word is an option', () => {
    const args = parseCliArgs(['--config', 'odx.json']);
    expect(args).toEqual({ config: 'odx.json', exclude: [], failOnUnsupported: false, verbose: false });
  });

  it('collects excludes, the file cap and the failure flag', () => {
    const args = parseCliArgs(['analyze', '--exclude', 'old/**', '--exclude', 'tmp/**', '--fail-on-unsupported', '--max-files', '20']);
    expect([args.exclude, args.maxFiles, args.failOnUnsupported]).toEqual([['old/**', 'tmp/**'], 20, true]);
  });

  it('takes an explicit value for the failure flag', () => {
    expect(parseCliArgs(['analyze', '--fail-on-unsupported', 'false', '-v'])).toMatchObject({ failOnUnsupported: false, verbose: true });
  });
});

describe('option values', () => {
  it('blank paths are absent', () => {
    expect(pathOption('  ')).toBeUndefined();
    expect(pathOption(undefined)).toBeUndefined();
    expect(pathOption('out/gap.md')).toBe('out/gap.md');
  });

  it('--max-files takes a positive integer', () => {
    expect(parseMaxFiles('12')).toBe(12);
    expect(parseMaxFiles(undefined)).toBeUndefined();
    const err = thrownBy(() => parseMaxFiles('2.5'));
    expect(err).toBeInstanceOf(ConfigError);
    expect(err instanceof ConfigError && err.message).toBe("--max-files must be a positive integer, got '2.5'");
    expect(thrownBy(() => parseMaxFiles('0'))).toBeInstanceOf(ConfigError);
  });

  it('--fail-on-unsupported is true when bare and otherwise true or false', () => {
    expect(parseFailOnUnsupported(true)).toBe(true);
    expect(parseFailOnUnsupported(undefined)).toBe(false);
    expect(parseFailOnUnsupported('FALSE')).toBe(false);
    const err = thrownBy(() => parseFailOnUnsupported('maybe'));
    expect(err instanceof ConfigError && err.message).toBe("--fail-on-unsupported takes true or false, got 'maybe'");
  });
});
