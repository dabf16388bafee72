import { readFileSync } from "node:fs";
import chalk from "chalk";
import { Command, CommanderError } from "commander";
import { formatSummary } from "./lib/episode-summary";
import { runPreview, type PreviewRequest, type PreviewResult } from "./lib/preview";
import { resolveConfig, type PreviewOptions } from "./utils/config";
import { formatError } from "./utils/errors";
import { setLogLevel } from "./utils/logger";
import { hasPropertyOfType, isNonEmptyString } from "./utils/typeGuards";

function readPackageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return hasPropertyOfType(raw, "version", isNonEmptyString) ? raw.version : "0.0.0";
}

export type PreviewRunner = (request: PreviewRequest) => Promise<PreviewResult>;

export interface ProgramIO {
  run?: PreviewRunner;
  print?: (line: string) => void;
  writeErr?: (text: string) => void;
}

export function createProgram({
  run = (request) => runPreview(request),
  print = (line) => console.log(line),
  writeErr = (text) => process.stderr.write(text),
}: ProgramIO = {}): Command {
  const program = new Command();

  program
    .name("lerobot-preview")
    .description("Download a LeRobot episode from a GCP bucket and open it in the Rerun Viewer")
    .version(readPackageVersion())
    .argument("<bucket>", "GCP bucket name")
    .argument("<dataset-path>", "Path to the directory containing the LeRobot dataset")
    .argument("<episode>", "Exact episode name, e.g. episode_000012")
    .option("--project <id>", "GCP project name")
    .option("--cache-dir <dir>", "Cache root (default: $LEROBOT_PREVIEW_CACHE_DIR or <tmp>/rerun)")
    .option("--rerun-bin <path>", "Rerun Viewer executable (default: $RERUN_BIN or rerun)")
    .option("--no-viewer", "Download the episode without opening the viewer")
    .option("--refresh-metadata", "Download dataset metadata again even if cached")
    .option("-v, --verbose", "Enable verbose logging")
    .allowExcessArguments(false)
    .configureOutput({ writeErr })
    .hook("preAction", (thisCommand) => {
      setLogLevel(resolveConfig(thisCommand.opts<PreviewOptions>()).logLevel);
    })
    .action(
      async (bucket: string, datasetPath: string, episode: string, options: PreviewOptions) => {
        const result = await run({ bucket, datasetPath, episode, options });

        print(chalk.green(`\n📁 Episode cached at: ${result.cacheDir}`));
        formatSummary(result.summary).forEach((line) => print(`   ${line}`));
        if (!result.viewerLaunched) {
          print(chalk.yellow(`   Viewer skipped; open it with: rerun ${result.cacheDir}`));
        }
      },
    );

  return program;
}

/**
 * Parses `argv` and runs the preview. Resolves with the process exit code.
 */
export async function main(argv: string[] = process.argv, io: ProgramIO = {}): Promise<number> {
  const program = createProgram(io);
  program.exitOverride();

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    // Commander has already written its own message (usage errors, --help, --version)
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    console.error(chalk.red("Preview failed:"), formatError(error));
    return 1;
  }
}
