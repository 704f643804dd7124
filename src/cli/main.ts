#!/usr/bin/env node

import path from "path";
import { Command } from "commander";
import { Clickstart } from "../core/extension";
import { loadClickstartConfig } from "../core/config-loader";
import { createProject } from "../host";
import { defaultLogger, type Logger } from "../util/logger";
import { clickstartVersion } from "../util/package-info";

interface CliOptions {
  package?: string;
  legacy?: boolean;
  update?: boolean;
  force?: boolean;
  config?: string;
  output?: string;
  quiet?: boolean;
  debug?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

async function handleCreateCommand(
  cwd: string,
  project: string,
  opts: CliOptions,
) {
  const logger = createCliLogger(opts);

  const { config, configPath } = await loadClickstartConfig(cwd, {
    configPath: opts.config,
    logger: logger.child("[config]"),
  });

  const layout = opts.legacy ? "setup.cfg" : config.layout;
  const outputDir = path.resolve(cwd, opts.output ?? ".");

  logger.debug(
    `Creating ${project} (output=${outputDir}, config=${configPath ?? "none"}, layout=${layout ?? "default"})`,
  );

  const extension = new Clickstart({
    ...config,
    layout,
    logger: logger.child("[clickstart]"),
  });

  const result = createProject(
    {
      project,
      package: opts.package,
      update: opts.update,
      force: opts.force,
      outputDir,
    },
    { extensions: [extension], logger },
  );

  logger.info(
    `Done. ${result.created.length} created, ${result.updated.length} updated, ` +
      `${result.skipped.length} kept in ${result.root}`,
  );
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("clickstart")
    .description("Generate a Python project set up as a Click CLI application")
    .version(clickstartVersion(), "--version")
    .argument("<project>", "Project name; also the directory to create")
    .option("-p, --package <name>", "Package name (default: project name with _ for -)")
    .option("--legacy", "Keep and patch setup.cfg instead of using pyproject.toml")
    .option("--update", "Update an existing project; user-edited files are kept")
    .option("--force", "Write into an existing, non-empty directory")
    .option("-c, --config <path>", "Path to clickstart config file")
    .option("-o, --output <dir>", "Directory to create the project in (default: cwd)")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging")
    .action(async (project: string, opts: CliOptions) => {
      await handleCreateCommand(cwd, project, opts);
    });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  defaultLogger.error(err);
  process.exit(1);
});
