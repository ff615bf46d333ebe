import { describe, it, expect, vi } from 'vitest';
import { resolve } from 'node:path';
import { buildJobInput, createProgram } from '../program.js';
import type { OrchestratorOptions, RunOutcome } from '../../orchestrator/index.js';

const DELIVERED: RunOutcome = { state: 'Delivered', exitCode: 0, deliveries: [] };

describe('buildJobInput', () => {
  it('prefers flags over RESOLVE_* variables', () => {
    const job = buildJobInput(
      { project: 'FlagProject', status: 'Complete' },
      {
        RESOLVE_PROJECT: 'EnvProject',
        RESOLVE_TIMELINE: 'Timeline_01',
        RESOLVE_OUTPUT: 'master_prores.mov',
        RESOLVE_STATUS: 'Failed',
        RESOLVE_ERROR: 'disk full',
      },
    );

    expect(job).toEqual({
      projectName: 'FlagProject',
      timelineName: 'Timeline_01',
      outputFilename: 'master_prores.mov',
      status: 'Complete',
      errorDetail: 'disk full',
    });
  });

  it('leaves missing fields undefined for validation downstream', () => {
    expect(buildJobInput({}, {})).toEqual({
      projectName: undefined,
      timelineName: undefined,
      outputFilename: undefined,
      status: undefined,
      errorDetail: undefined,
    });
  });
});

describe('createProgram', () => {
  it('passes parsed flags to the run and reports its outcome', async () => {
    const run = vi.fn(async (_options: OrchestratorOptions) => DELIVERED);
    const onOutcome = vi.fn();
    const program = createProgram(onOutcome, run, {});

    await program.parseAsync([
      '--project', 'MyProject',
      '--timeline', 'Timeline_01',
      '--output', 'master_prores.mov',
      '--status', 'Failed',
      '--error', 'disk full',
      '--settings', 'conf/settings.json',
      '--verbose',
      '--quiet',
    ], { from: 'user' });

    expect(run).toHaveBeenCalledOnce();
    const options = run.mock.calls[0]![0];
    expect(options).toMatchObject({
      settingsPath: resolve('conf/settings.json'),
      job: {
        projectName: 'MyProject',
        timelineName: 'Timeline_01',
        outputFilename: 'master_prores.mov',
        status: 'Failed',
        errorDetail: 'disk full',
      },
      verbose: true,
      output: null,
    });
    expect(onOutcome).toHaveBeenCalledWith(DELIVERED);
  });

  it('defaults to the settings file beside the install', async () => {
    const run = vi.fn(async (_options: OrchestratorOptions) => DELIVERED);
    const program = createProgram(vi.fn(), run, {});

    await program.parseAsync([], { from: 'user' });

    expect(run.mock.calls[0]![0].settingsPath).toMatch(
      /resolve_slack_settings[\\/]resolve_slack_settings\.json$/,
    );
    expect(run.mock.calls[0]![0].verbose).toBe(false);
  });
});
