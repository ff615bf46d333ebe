import { Command } from 'commander';
import { resolve } from 'node:path';
import { resolveSettingsPath } from '../config/index.js';
import { PACKAGE_ROOT } from '../dependency/index.js';
import { runNotifier } from '../orchestrator/index.js';
import type { OrchestratorOptions, RunOutcome } from '../orchestrator/index.js';

export interface CliOptions {
  project?: string;
  timeline?: string;
  output?: string;
  status?: string;
  error?: string;
  settings?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Raw job descriptor from flags, falling back to the RESOLVE_* variables a
 * host wrapper may export instead. Flags win. Validation happens in the run.
 */
export function buildJobInput(options: CliOptions, env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  return {
    projectName: options.project ?? env['RESOLVE_PROJECT'],
    timelineName: options.timeline ?? env['RESOLVE_TIMELINE'],
    outputFilename: options.output ?? env['RESOLVE_OUTPUT'],
    status: options.status ?? env['RESOLVE_STATUS'],
    errorDetail: options.error ?? env['RESOLVE_ERROR'],
  };
}

/**
 * Build the render-notify command. `run` is injectable for tests; the action
 * stores the run's exit code in `onOutcome` instead of exiting the process.
 */
export function createProgram(
  onOutcome: (outcome: RunOutcome) => void,
  run: (options: OrchestratorOptions) => Promise<RunOutcome> = runNotifier,
  env: NodeJS.ProcessEnv = process.env,
): Command {
  const program = new Command();

  program
    .name('render-notify')
    .description('Post a finished render job to Slack and the desktop')
    .version('0.1.0')
    .showHelpAfterError('(run render-notify --help for usage information)')
    .addHelpText('after', `
Examples:
  $ render-notify --project MyProject --timeline Timeline_01 --output master_prores.mov --status Complete
  $ render-notify --project MyProject --timeline Timeline_01 --output master_prores.mov --status Failed --error "disk full"

Settings:
  resolve_slack_settings/resolve_slack_settings.json beside the install, created on first run.
  RENDER_NOTIFY_SLACK_TOKEN, RENDER_NOTIFY_CHANNEL_NAME, ... override file values.
`)
    .option('--project <name>', 'Project name (env: RESOLVE_PROJECT)')
    .option('--timeline <name>', 'Timeline name (env: RESOLVE_TIMELINE)')
    .option('--output <filename>', 'Rendered output filename (env: RESOLVE_OUTPUT)')
    .option('--status <status>', 'Job status: Complete or Failed (env: RESOLVE_STATUS)')
    .option('--error <text>', 'Error text for failed jobs (env: RESOLVE_ERROR)')
    .option('--settings <path>', 'Path to resolve_slack_settings.json')
    .option('--verbose', 'Log diagnostics (node, host, paths, raw input)')
    .option('--quiet', 'Do not echo log entries to the console')
    .action(async (options: CliOptions) => {
      const outcome = await run({
        settingsPath: options.settings
          ? resolve(options.settings)
          : resolveSettingsPath(PACKAGE_ROOT),
        job: buildJobInput(options, env),
        env,
        verbose: options.verbose ?? false,
        output: options.quiet ? null : process.stdout,
      });
      onOutcome(outcome);
    });

  return program;
}
