import { describe, expect, it } from 'vitest';

import { extractCommand } from '../src/agent/commandExtractor';

describe('extractCommand', () => {
  it('returns a bare command unchanged', () => {
    expect(extractCommand('ls -la')).toBe('ls -la');
  });

  it('takes the first line of a fenced block', () => {
    const text = 'Here you go:\n```bash\nfind . -name "*.ts"\necho done\n```\nThat lists files.';
    expect(extractCommand(text)).toBe('find . -name "*.ts"');
  });

  it('handles an inline fence', () => {
    expect(extractCommand('```df -h```')).toBe('df -h');
  });

  it('strips shell prompt markers and wrapping backticks', () => {
    expect(extractCommand('$ du -sh .')).toBe('du -sh .');
    expect(extractCommand('`pwd`')).toBe('pwd');
  });

  it('skips leading blank lines and normalises CRLF', () => {
    expect(extractCommand('\r\n\r\n  whoami  \r\nextra')).toBe('whoami');
  });

  it('returns an empty string when nothing is left', () => {
    expect(extractCommand('')).toBe('');
    expect(extractCommand('```\n\n```')).toBe('');
  });
});
