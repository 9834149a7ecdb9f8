import { Command } from "commander";

import type { GateSettings } from "../core/config.js";
import type { SettingsOverrides } from "../core/config-loader.js";

import { loadSettingsForCli } from "./config.js";
import { projectsCommand, resolveCommand, runCommand, syncCommand } from "./gate.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

type QueueOptions = {
  queueBranch?: string;
  queueRef?: string;
  projectUnderTest?: string;
  overrideBranch?: string;
  skipSelfProject?: boolean;
  logsDir?: string;
};

function addQueueOptions(command: Command): Command {
  return command
    .option("--queue-branch <branch>", "Branch the merge queue is testing (default: $ZUUL_BRANCH)")
    .option("--queue-ref <ref>", "Change reference to test (default: $ZUUL_REF)")
    .option("--project-under-test <project>", "Project the change belongs to (default: $ZUUL_PROJECT)")
    .option("--override-branch <branch>", "Branch to try first (default: $OVERRIDE_ZUUL_BRANCH)")
    .option("--skip-self-project", "Leave the gate tooling project out of the project set")
    .option("--logs-dir <dir>", "Directory for JSONL and hook logs");
}

function toOverrides(opts: QueueOptions, globals: GlobalOptions): SettingsOverrides {
  return {
    queueBranch: opts.queueBranch,
    queueChangeRef: opts.queueRef,
    projectUnderTest: opts.projectUnderTest,
    overrideBranch: opts.overrideBranch,
    skipSelfProject: opts.skipSelfProject,
    logsDir: opts.logsDir,
    debug: globals.debug,
  };
}

export function buildCli(): Command {
  const program = new Command();

  const resolveSettings = (opts: QueueOptions): GateSettings => {
    const globals = program.opts<GlobalOptions>();
    const { settings } = loadSettingsForCli({
      explicitConfigPath: globals.config,
      overrides: toOverrides(opts, globals),
    });
    return settings;
  };

  program
    .name("workspace-gate")
    .description("Check out a consistent multi-project workspace for a merge-queue change")
    .version("0.1.0")
    .option("--config <path>", "Gate config path (default: $GATE_CONFIG or ./gate.yaml)")
    .option("--debug", "Show error details and stack traces", false);

  addQueueOptions(
    program
      .command("run")
      .description("Sync every workspace pass, then run the pre-test, gate and post-test hooks"),
  ).action(async (opts: QueueOptions, command: Command) => {
    await runCommand(resolveSettings(opts), { handOffArgs: command.args });
  });

  addQueueOptions(
    program
      .command("sync")
      .description("Sync the project set at one branch into a destination directory")
      .requiredOption("--branch <branch>", "Branch to check out")
      .requiredOption("--dest <dir>", "Destination root for the working trees"),
  ).action(async (opts: QueueOptions & { branch: string; dest: string }) => {
    await syncCommand(resolveSettings(opts), { branch: opts.branch, dest: opts.dest });
  });

  addQueueOptions(
    program
      .command("resolve")
      .description("Print the reference one project would be checked out at")
      .argument("<project>", "Project identifier, e.g. openstack/nova")
      .requiredOption("--branch <branch>", "Requested branch")
      .requiredOption("--dest <dir>", "Destination root for the working tree"),
  ).action(async (project: string, opts: QueueOptions & { branch: string; dest: string }) => {
    await resolveCommand(resolveSettings(opts), {
      project,
      branch: opts.branch,
      dest: opts.dest,
    });
  });

  program
    .command("projects")
    .description("Print the ordered project set")
    .option("--skip-self-project", "Leave the gate tooling project out of the project set")
    .action((opts: QueueOptions) => {
      projectsCommand(resolveSettings(opts));
    });

  return program;
}
