import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { OfflineBuffer, silentLogger } from '@stratamem/core';
import { BUFFER_HELP, parseBufferArgs, runBufferCommand } from '../bufferCli.js';

const DEFAULT_URL = 'http://localhost:8080';

describe('parseBufferArgs', () => {
  it('shows help without a command', () => {
    expect(parseBufferArgs([], DEFAULT_URL)).toEqual({ kind: 'help' });
    expect(parseBufferArgs(['count', '--help'], DEFAULT_URL)).toEqual({ kind: 'help' });
  });

  it('uses the default server for sync', () => {
    expect(parseBufferArgs(['sync'], DEFAULT_URL)).toEqual({ kind: 'sync', url: DEFAULT_URL });
    expect(parseBufferArgs(['sync', '--url', 'http://memory.test'], DEFAULT_URL)).toEqual({
      kind: 'sync',
      url: 'http://memory.test',
    });
  });

  it('reads the tag to remove', () => {
    expect(parseBufferArgs(['remove-tag', 'heartbeat', '--dry-run'], DEFAULT_URL)).toEqual({
      kind: 'remove-tag',
      tag: 'heartbeat',
      dryRun: true,
    });
  });

  it('rejects remove-tag without a tag', () => {
    expect(() => parseBufferArgs(['remove-tag'], DEFAULT_URL)).toThrow('remove-tag needs a tag');
  });

  it('rejects unknown commands', () => {
    expect(() => parseBufferArgs(['flush'], DEFAULT_URL)).toThrow('Unknown command "flush"');
  });
});

describe('runBufferCommand', () => {
  let dir: string;
  let buffer: OfflineBuffer;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stratamem-cli-'));
    buffer = new OfflineBuffer(path.join(dir, 'buffer.jsonl'), silentLogger);
    await buffer.enqueue({ content: 'heartbeat ok', tags: ['heartbeat'] });
    await buffer.enqueue({ content: 'Chose Postgres', tags: ['decision'] });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('prints the help text', async () => {
    expect(await runBufferCommand(buffer, { kind: 'help' })).toBe(BUFFER_HELP);
  });

  it('counts records', async () => {
    expect(await runBufferCommand(buffer, { kind: 'count' })).toBe(
      `2 buffered record(s) in ${path.join(dir, 'buffer.jsonl')}`,
    );
  });

  it('previews a tag removal without writing', async () => {
    const output = await runBufferCommand(buffer, { kind: 'remove-tag', tag: 'heartbeat', dryRun: true });

    expect(output).toBe('Would remove 1 record(s) tagged "heartbeat", 2 remaining');
    expect(await buffer.count()).toBe(2);
  });

  it('removes tagged records', async () => {
    const output = await runBufferCommand(buffer, { kind: 'remove-tag', tag: 'heartbeat', dryRun: false });

    expect(output).toBe('Removed 1 record(s) tagged "heartbeat", 1 remaining');
    expect((await buffer.readAll()).map(record => record.content)).toEqual(['Chose Postgres']);
  });

  it('clears the buffer', async () => {
    await runBufferCommand(buffer, { kind: 'clear' });
    expect(await buffer.count()).toBe(0);
  });
});
