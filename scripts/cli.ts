import { Command, CommanderError } from "commander";
import { ZodError } from "zod";
import type { IconFetcher } from "../typings/icon-record.js";
import { loadConfig, type IconsmithConfig } from "./config.js";
import { isIconsmithError } from "./errors.js";
import { createIconsmith, type Iconsmith, type RunResult } from "./iconsmith.js";
import { IconifyClient } from "./registry/iconify-api.js";
import { saveRunLog } from "./utils/build-log.js";

type GlobalOptions = {
  output?: string;
  logFile?: string;
};

export interface ProgramDependencies {
  createFetcher?: (config: IconsmithConfig) => IconFetcher;
}

function defaultFetcher(config: IconsmithConfig): IconFetcher {
  return new IconifyClient({ baseUrl: config.apiBaseUrl, timeoutMs: config.timeoutMs });
}

function printFailures(result: RunResult) {
  if (result.failed.length === 0) return;
  console.log(`\n${result.failed.length} item(s) failed:`);
  for (const failure of result.failed) {
    console.log(`  ${failure.input} [${failure.kind}] ${failure.message}`);
  }
}

export function createProgram(dependencies: ProgramDependencies = {}): Command {
  const createFetcher = dependencies.createFetcher ?? defaultFetcher;
  const program = new Command();

  program
    .name("iconsmith")
    .description("Generate typed icon modules from the Iconify registry and local SVG files")
    .version("0.1.0")
    .option("-o, --output <dir>", "output directory for generated modules (default: src/icons)")
    .option("--log-file <path>", "save the run log as JSON")
    .showHelpAfterError()
    .exitOverride();

  async function withIconsmith(action: (iconsmith: Iconsmith, config: IconsmithConfig) => Promise<void>) {
    const globals = program.opts<GlobalOptions>();
    const config = loadConfig(globals.output === undefined ? {} : { outputDir: globals.output });
    const iconsmith = createIconsmith({
      outputDir: config.outputDir,
      fetcher: createFetcher(config),
      batchSize: config.batchSize,
    });

    await action(iconsmith, config);

    if (globals.logFile) {
      await saveRunLog(globals.logFile);
    }
  }

  program
    .command("init")
    .alias("i")
    .description("create the index module in the output directory")
    .action(() =>
      withIconsmith(async (iconsmith, config) => {
        const created = await iconsmith.init();
        if (created) {
          console.log(`\nAdd icons with: iconsmith add <collection:icon-name> -o ${config.outputDir}`);
        }
      })
    );

  program
    .command("add")
    .alias("a")
    .description("add icons by collection:icon-name, SVG file or directory of SVG files")
    .argument("<inputs...>", "icon identifiers (e.g. mdi:home), .svg files or directories")
    .option("--skip-existing", "leave icons that are already generated untouched", false)
    .action((inputs: string[], options: { skipExisting: boolean }) =>
      withIconsmith(async (iconsmith, config) => {
        const result = await iconsmith.add(inputs, { skipExisting: options.skipExisting });
        printFailures(result);

        if (result.added.length > 0) {
          console.log(`\nAdded ${result.added.length} icon(s) to ${config.outputDir}`);
          for (const collection of result.collections) {
            console.log(`  ${collection}`);
          }
        }
        if (result.skipped.length > 0) {
          console.log(`Skipped ${result.skipped.length} existing icon(s)`);
        }
      })
    );

  program
    .command("list")
    .alias("l")
    .description("list generated icons by collection")
    .action(() =>
      withIconsmith(async (iconsmith, config) => {
        const collections = await iconsmith.list();
        if (collections.size === 0) {
          console.log(`No icons found in ${config.outputDir}`);
          return;
        }

        let total = 0;
        for (const [collection, names] of collections) {
          console.log(`${collection} (${names.length})`);
          for (const name of names) {
            console.log(`  ${name}`);
          }
          total += names.length;
        }
        console.log(`\nTotal: ${total} icon(s)`);
      })
    );

  program
    .command("update")
    .alias("u")
    .description("re-fetch every generated icon and regenerate the index module")
    .action(() =>
      withIconsmith(async (iconsmith) => {
        const result = await iconsmith.update();
        printFailures(result);
        if (result.added.length > 0) {
          console.log(`\nUpdated ${result.added.length} icon(s)`);
        }
      })
    );

  return program;
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    return `Invalid configuration: ${issues.join("; ")}`;
  }
  if (isIconsmithError(error)) {
    return `${error.kind}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parses `argv` and runs the command. Resolves to the process exit code: per-item failures still exit 0.
 */
export async function run(argv: string[], dependencies?: ProgramDependencies): Promise<number> {
  const program = createProgram(dependencies);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    console.error(`Error: ${describeError(error)}`);
    return 1;
  }
}
