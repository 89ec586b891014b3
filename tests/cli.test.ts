import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { run, VERSION, type CliIO } from '../src/cli.js';
import { createBuffer } from './helpers.js';

function createIO(env: Record<string, string | undefined> = {}) {
  const stdout = createBuffer();
  const stderr = createBuffer();
  const io: CliIO = { stdout, stderr, env };
  return { io, stdout, stderr };
}

describe('sectconf CLI', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sectconf-cli-'));
    writeFileSync(
      join(dir, 'app.conf'),
      '# demo\nglobal { port = 300 debug = false name = "svc" tags = [1, "a"] }\nproject { one { x = 1 } two {} }\n'
    );
    writeFileSync(join(dir, 'bad.conf'), 'a { b = 1 c { d = 2 } }');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function sectconf(args: string[], env?: Record<string, string | undefined>) {
    const ctx = createIO(env);
    return run(['node', 'sectconf', '-C', dir, ...args], ctx.io).then((code) => ({ code, ...ctx }));
  }

  it('checks a valid file', async () => {
    const { code, stdout } = await sectconf(['check', 'app.conf']);
    expect(code).toBe(0);
    expect(stdout.text()).toContain('ok (2 sections)');
  });

  it('reports the selected environment', async () => {
    const plain = await sectconf(['check', 'app.conf']);
    expect(plain.stdout.text()).toContain('ok (2 sections)');
    expect(plain.stdout.text()).not.toContain('env');

    const prod = await sectconf(['--env', 'prod', 'check', 'app.conf']);
    expect(prod.code).toBe(0);
    expect(prod.stdout.text()).toContain('ok (2 sections, env prod)');
    expect(prod.stderr.text()).toContain('[INFO] [sectconf:check] Environment selected');
    expect(prod.stderr.text()).toContain('environment="prod"');
  });

  it('prints 64-bit integers exactly', async () => {
    writeFileSync(
      join(dir, 'ids.conf'),
      'ids { big = 9223372036854775807 all = [1, -9223372036854775808] }'
    );
    expect((await sectconf(['get', 'ids.conf', 'ids.big'])).stdout.text()).toBe(
      '9223372036854775807\n'
    );
    expect(
      (await sectconf(['get', 'ids.conf', 'ids.big', '--as', 'int', '--width', 'i64'])).stdout.text()
    ).toBe('9223372036854775807\n');
    expect((await sectconf(['get', 'ids.conf', 'ids.all', '--as', 'list'])).stdout.text()).toBe(
      '[1,-9223372036854775808]\n'
    );
  });

  it('prints values', async () => {
    expect((await sectconf(['get', 'app.conf', 'global.port'])).stdout.text()).toBe('300\n');
    expect((await sectconf(['get', 'app.conf', 'global.name'])).stdout.text()).toBe('svc\n');
    expect((await sectconf(['get', 'app.conf', 'global.tags'])).stdout.text()).toBe('[1,"a"]\n');
    expect(
      (await sectconf(['get', 'app.conf', 'global.debug', '--as', 'bool'])).stdout.text()
    ).toBe('false\n');
  });

  it('fails typed reads that do not fit', async () => {
    const { code, stdout, stderr } = await sectconf([
      'get',
      'app.conf',
      'global.port',
      '--as',
      'int',
      '--width',
      'u8',
    ]);
    expect(code).toBe(1);
    expect(stdout.text()).toBe('');
    expect(stderr.text()).toContain('error: Value 300 at "global.port" does not fit u8');
  });

  it('fails unknown paths', async () => {
    const { code, stderr } = await sectconf(['get', 'app.conf', 'global.nope']);
    expect(code).toBe(1);
    expect(stderr.text()).toContain('No property at "global.nope"');
  });

  it('lists keys', async () => {
    expect((await sectconf(['keys', 'app.conf'])).stdout.lines()).toEqual(['global', 'project']);
    expect((await sectconf(['keys', 'app.conf', 'project'])).stdout.lines()).toEqual([
      'one',
      'two',
    ]);
    expect((await sectconf(['keys', 'app.conf', 'global'])).stdout.lines()).toEqual([
      'port',
      'debug',
      'name',
      'tags',
    ]);
    expect((await sectconf(['keys', 'app.conf', 'project.two'])).stdout.lines()).toEqual([]);
  });

  it('formats files canonically', async () => {
    const { stdout } = await sectconf(['format', 'app.conf']);
    expect(stdout.text()).toBe(
      [
        'global {',
        '  port = 300',
        '  debug = false',
        '  name = "svc"',
        '  tags = [1, "a"]',
        '}',
        'project {',
        '  one {',
        '    x = 1',
        '  }',
        '  two {}',
        '}',
        '',
      ].join('\n')
    );
  });

  it('reports parse errors with their location', async () => {
    const { code, stderr } = await sectconf(['check', 'bad.conf']);
    expect(code).toBe(1);
    const text = stderr.text();
    expect(text).toContain('[ERROR] [sectconf:check] InvalidFormat:');
    expect(text).toContain('line=1 column=11');
    expect(text).toContain('<<< HERE');
  });

  it('silences logs below the configured level', async () => {
    const { code, stderr } = await sectconf(['check', 'bad.conf'], { SECTCONF_LOG_LEVEL: 'error' });
    expect(code).toBe(1);
    expect(stderr.text()).toContain('InvalidFormat');

    const quiet = await sectconf(['--log-level', 'error', 'check', 'app.conf']);
    expect(quiet.stderr.text()).toBe('');
  });

  it('reports missing files', async () => {
    const { code, stderr } = await sectconf(['check', 'missing.conf']);
    expect(code).toBe(1);
    expect(stderr.text()).toContain('error: Cannot read');
  });

  it('prints its version', async () => {
    const { code, stdout } = await sectconf(['--version']);
    expect(code).toBe(0);
    expect(stdout.text()).toBe(`${VERSION}\n`);
  });

  it('rejects unknown commands', async () => {
    const { code, stderr } = await sectconf(['explode']);
    expect(code).toBe(1);
    expect(stderr.text()).toContain("unknown command 'explode'");
  });
});
