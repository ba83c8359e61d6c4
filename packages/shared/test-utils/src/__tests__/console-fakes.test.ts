import { describe, it, expect } from 'vitest';
import { MemoryOutput, ScriptedLineReader } from '../console-fakes';
import { createMockLogger } from '../logger-mock';

describe('ScriptedLineReader', () => {
  it('should replay lines in order then report end of input', async () => {
    const reader = new ScriptedLineReader(['1', 'Road Trip']);

    expect(await reader.readLine('Choose: ')).toBe('1');
    expect(await reader.readLine('Name: ')).toBe('Road Trip');
    expect(await reader.readLine('Choose: ')).toBeNull();
    expect(reader.prompts).toEqual(['Choose: ', 'Name: ', 'Choose: ']);
  });

  it('should return null once closed', async () => {
    const reader = new ScriptedLineReader(['unread']);
    reader.close();

    expect(await reader.readLine('> ')).toBeNull();
    expect(reader.remaining).toBe(1);
  });
});

describe('MemoryOutput', () => {
  it('should count screen clears and strip escape sequences', () => {
    const out = new MemoryOutput();

    out.write('\x1B[2J\x1B[H');
    out.write('first\n');
    out.write('\x1B[2J\x1B[Hsecond\n');

    expect(out.clears).toBe(2);
    expect(out.text).toBe('first\nsecond\n');
    expect(out.lines).toEqual(['first', 'second', '']);
  });
});

describe('createMockLogger', () => {
  it('should return itself from child', () => {
    const logger = createMockLogger();

    expect(logger.child()).toBe(logger);
  });
});
