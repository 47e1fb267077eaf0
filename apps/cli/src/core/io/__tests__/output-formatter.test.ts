import { describe, it, expect } from 'vitest';
import * as yaml from 'js-yaml';
import type { BaseResult, CommandResults } from '../../command-results.js';
import { OutputFormatter } from '../output-formatter.js';

interface SampleResult extends BaseResult {
  container?: string;
}

function sampleResults(results: SampleResult[]): CommandResults<SampleResult> {
  return {
    command: 'check',
    profile: 'self-hosted',
    timestamp: new Date('2024-05-01T12:00:00.000Z'),
    duration: 42,
    results,
    summary: {
      total: results.length,
      succeeded: results.filter(r => r.success).length,
      failed: results.filter(r => !r.success).length,
      warnings: 0,
    },
    executionContext: { user: 'tester', workingDirectory: '/srv/kcidb' },
  };
}

describe('OutputFormatter', () => {
  const results = sampleResults([
    { entity: 'db', success: true, status: 'healthy', container: 'postgres' },
    { entity: 'dbinit', success: false, status: 'exited', error: 'exited with code 1' },
  ]);

  it('renders a plain summary', () => {
    const output = OutputFormatter.format(results, { format: 'summary', quiet: false, verbose: false, colors: false });

    expect(output).toBe(
      '📊 check completed in 42ms\n' +
        '[OK] db: healthy\n' +
        '[FAIL] dbinit: exited\n' +
        '   error: exited with code 1\n' +
        '\n' +
        'Summary: 1 succeeded, 1 failed, 2 total\n'
    );
  });

  it('shows extra fields in verbose mode', () => {
    const output = OutputFormatter.format(results, { format: 'summary', quiet: false, verbose: true, colors: false });

    expect(output).toContain('[OK] db: healthy\n   container: postgres\n');
    expect(output).toContain('Profile: self-hosted\n');
  });

  it('prints only result lines when quiet', () => {
    const output = OutputFormatter.format(results, { format: 'summary', quiet: true, verbose: false, colors: false });

    expect(output).toBe('[OK] db: healthy\n[FAIL] dbinit: exited\n   error: exited with code 1\n');
  });

  it('serializes dates in JSON', () => {
    const parsed: unknown = JSON.parse(OutputFormatter.format(results, { format: 'json', quiet: false, verbose: false }));

    expect(parsed).toMatchObject({ command: 'check', timestamp: '2024-05-01T12:00:00.000Z' });
  });

  it('emits YAML that parses back', () => {
    const parsed = yaml.load(OutputFormatter.format(results, { format: 'yaml', quiet: false, verbose: false }));

    expect(parsed).toMatchObject({
      profile: 'self-hosted',
      summary: { total: 2, succeeded: 1, failed: 1, warnings: 0 },
      results: [{ entity: 'db', container: 'postgres' }, { entity: 'dbinit', error: 'exited with code 1' }],
    });
  });
});
