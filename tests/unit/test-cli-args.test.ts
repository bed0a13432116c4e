import { describe, it, expect } from 'vitest';
import { parseArgs, usageText } from '../../src/cli-args.js';

describe('CLI arguments', () => {
  it('parses no arguments as an interactive session', () => {
    expect(parseArgs([])).toEqual({});
  });

  it('parses a one-shot query with a config file', () => {
    expect(parseArgs(['-c', 'ops.yaml', '--query', 'pods over 90% cpu'])).toEqual({
      configPath: 'ops.yaml',
      query: 'pods over 90% cpu',
    });
  });

  it('parses flags', () => {
    expect(parseArgs(['--show-context', '--help', '--version'])).toEqual({
      showContext: true,
      help: true,
      version: true,
    });
  });

  it('reports missing values', () => {
    expect(parseArgs(['--config']).error).toBe('--config requires a file path');
    expect(parseArgs(['-q', '   ']).error).toBe('--query requires a question');
  });

  it('reports unknown options', () => {
    expect(parseArgs(['--verbose']).error).toBe('Unknown option: --verbose');
  });

  it('shows the version in the usage text', () => {
    expect(usageText('0.1.0')).toContain('Ops Copilot v0.1.0');
  });
});
